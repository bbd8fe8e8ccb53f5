export { listTemplates, getTemplate } from "./templates.js";
export { FRAMEWORKS, getFrameworkProfile, listFrameworks } from "./frameworks.js";
export {
  FrameworkTagSchema,
  type FrameworkTag,
  TemplateSchema,
  type Template,
  FrameworkProfileSchema,
  type FrameworkProfile,
} from "./catalog.schema.js";
