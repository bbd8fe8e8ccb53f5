export {
  buildDownloadArtifacts,
  codeFileName,
  installCommand,
  requirementsFor,
  type DownloadArtifact,
} from "./downloadArtifacts.js";
