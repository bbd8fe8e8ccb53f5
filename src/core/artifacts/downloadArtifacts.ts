import { getFrameworkProfile, type FrameworkTag } from "../catalog/index.js";

export interface DownloadArtifact {
  fileName: string;
  mimeType: string;
  content: string;
}

export function codeFileName(framework: FrameworkTag): string {
  return `${framework.toLowerCase()}_system.py`;
}

/** requirements.txt body: the framework's package plus the runtime helpers. */
export function requirementsFor(framework: FrameworkTag): string {
  return `${getFrameworkProfile(framework).pipPackage} python-dotenv google-generativeai\n`;
}

export function installCommand(framework: FrameworkTag): string {
  return `pip install ${requirementsFor(framework).trim()}`;
}

/** The generated code file and its requirements.txt, ready to hand to the user. */
export function buildDownloadArtifacts(framework: FrameworkTag, code: string): DownloadArtifact[] {
  return [
    {
      fileName: codeFileName(framework),
      mimeType: "text/x-python",
      content: code.endsWith("\n") ? code : `${code}\n`,
    },
    {
      fileName: "requirements.txt",
      mimeType: "text/plain",
      content: requirementsFor(framework),
    },
  ];
}
