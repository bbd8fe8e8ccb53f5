import { execFileSync } from "node:child_process";
import pino from "pino";
import type { PythonSyntaxChecker, SyntaxCheckResult } from "./pythonSyntax.js";
import type { SyntaxCheckFailure } from "../schemas/index.js";

const logger = pino({ name: "python-interpreter-checker" });

// Reads the program from stdin so nothing touches the filesystem.
const PARSE_SCRIPT = "import ast, sys\nast.parse(sys.stdin.read(), filename='<generated>')";

/**
 * InterpreterPythonChecker – asks a local Python to parse the code.
 * Exact, but needs `python3` (or PYTHON_BIN) on the host.
 */
export class InterpreterPythonChecker implements PythonSyntaxChecker {
  readonly name = "python";

  constructor(
    private readonly pythonBin = "python3",
    private readonly timeoutMs = 10_000,
  ) {}

  check(code: string): SyntaxCheckResult {
    try {
      execFileSync(this.pythonBin, ["-c", PARSE_SCRIPT], {
        input: code,
        encoding: "utf-8",
        timeout: this.timeoutMs,
        stdio: ["pipe", "pipe", "pipe"],
      });
      return { valid: true };
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        logger.error({ pythonBin: this.pythonBin }, "Python interpreter not found");
        return {
          valid: false,
          error: {
            kind: "SyntaxCheckFailure",
            message: `Python interpreter "${this.pythonBin}" not found; syntax was not checked`,
          },
        };
      }
      if (timedOut(error)) {
        logger.error({ pythonBin: this.pythonBin, timeoutMs: this.timeoutMs }, "Python syntax check timed out");
        return {
          valid: false,
          error: {
            kind: "SyntaxCheckFailure",
            message: `Syntax check timed out after ${this.timeoutMs} ms; syntax was not checked`,
          },
        };
      }
      return { valid: false, error: parseInterpreterError(stderrOf(error)) };
    }
  }
}

/**
 * Turn a Python traceback into a SyntaxCheckFailure:
 *
 *   File "<generated>", line 1
 *     print((1)
 *          ^
 *   SyntaxError: '(' was never closed
 */
export function parseInterpreterError(stderr: string): SyntaxCheckFailure {
  const lineMatch = /File "<generated>", line (\d+)/.exec(stderr);
  const errorLines = stderr
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => /^\w*(Error|Exception)\b/.test(l));
  const last = errorLines[errorLines.length - 1];

  return {
    kind: "SyntaxCheckFailure",
    message: last ?? (stderr.trim() || "Python rejected the code"),
    line: lineMatch?.[1] ? parseInt(lineMatch[1], 10) : undefined,
  };
}

function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}

/** execFileSync sets code ETIMEDOUT and the kill signal when `timeout` expires. */
function timedOut(error: unknown): boolean {
  if (errorCode(error) === "ETIMEDOUT") return true;
  return typeof error === "object" && error !== null && "signal" in error && typeof error.signal === "string";
}

function stderrOf(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const stderr = error.stderr;
    if (typeof stderr === "string") return stderr;
  }
  return error instanceof Error ? error.message : String(error);
}
