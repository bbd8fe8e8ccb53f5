import pino from "pino";
import type { FrameworkTag } from "../catalog/index.js";
import type {
  CodeSource,
  FrameworkMarkers,
  SyntaxCheckFailure,
} from "../schemas/index.js";
import { extractCode } from "./codeExtractor.js";
import { checkFrameworkMarkers } from "./frameworkMarkers.js";
import { BuiltinPythonChecker, type PythonSyntaxChecker } from "./pythonSyntax.js";
import { InterpreterPythonChecker } from "./interpreterChecker.js";

const logger = pino({ name: "response-validator" });

export interface ValidationOutcome {
  extractedCode: string;
  isValidSyntax: boolean;
  syntaxError?: SyntaxCheckFailure;
  codeSource: CodeSource;
  language?: string;
  frameworkMarkers: FrameworkMarkers;
}

/**
 * ResponseValidator
 * Extracts the code from a provider reply and syntax-checks it as Python.
 * Invalid syntax is reported on the outcome, never thrown.
 */
export class ResponseValidator {
  constructor(private readonly checker: PythonSyntaxChecker = new BuiltinPythonChecker()) {}

  validate(rawText: string, framework: FrameworkTag): ValidationOutcome {
    const extracted = extractCode(rawText);
    const frameworkMarkers = checkFrameworkMarkers(framework, extracted.code);

    const base = {
      extractedCode: extracted.code,
      codeSource: extracted.source,
      language: extracted.language,
      frameworkMarkers,
    };

    if (extracted.code.trim().length === 0) {
      return {
        ...base,
        isValidSyntax: false,
        syntaxError: { kind: "SyntaxCheckFailure", message: "The response contains no code" },
      };
    }

    const result = this.runChecker(extracted.code);

    logger.info(
      {
        checker: this.checker.name,
        source: extracted.source,
        blocks: extracted.blockCount,
        valid: result.valid,
        missingMarkers: frameworkMarkers.missing,
      },
      "Response validated",
    );

    return { ...base, isValidSyntax: result.valid, syntaxError: result.error };
  }

  private runChecker(code: string): { valid: boolean; error?: SyntaxCheckFailure } {
    try {
      return this.checker.check(code);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ checker: this.checker.name, error: message }, "Syntax checker crashed");
      return {
        valid: false,
        error: { kind: "SyntaxCheckFailure", message: `Syntax check could not run: ${message}` },
      };
    }
  }
}

export function createSyntaxChecker(options: {
  checker: "builtin" | "python";
  pythonBin: string;
}): PythonSyntaxChecker {
  return options.checker === "python"
    ? new InterpreterPythonChecker(options.pythonBin)
    : new BuiltinPythonChecker();
}
