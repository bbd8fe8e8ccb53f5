export { extractCode, type ExtractedCode } from "./codeExtractor.js";
export {
  BuiltinPythonChecker,
  type PythonSyntaxChecker,
  type SyntaxCheckResult,
} from "./pythonSyntax.js";
export { InterpreterPythonChecker, parseInterpreterError } from "./interpreterChecker.js";
export { checkFrameworkMarkers } from "./frameworkMarkers.js";
export {
  ResponseValidator,
  createSyntaxChecker,
  type ValidationOutcome,
} from "./responseValidator.js";
