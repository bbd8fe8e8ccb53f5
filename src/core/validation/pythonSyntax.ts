import { parser } from "@lezer/python";
import type { SyntaxCheckFailure } from "../schemas/index.js";

export interface SyntaxCheckResult {
  valid: boolean;
  error?: SyntaxCheckFailure;
}

/** Syntax-only check of Python source. Implementations report, never throw. */
export interface PythonSyntaxChecker {
  readonly name: string;
  check(code: string): SyntaxCheckResult;
}

interface OpenBracket {
  char: string;
  line: number;
  column: number;
}

const CLOSER_TO_OPENER: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
const TAB_SIZE = 8;

/**
 * BuiltinPythonChecker – Python syntax check with no interpreter.
 *
 * Two passes. The scanner reports token-level problems with the messages
 * Python uses (unterminated strings, unbalanced brackets, stray line
 * continuations, block indentation). Code that passes is then parsed with
 * the @lezer/python grammar and the first error node is reported as
 * "invalid syntax".
 */
export class BuiltinPythonChecker implements PythonSyntaxChecker {
  readonly name = "builtin";

  check(code: string): SyntaxCheckResult {
    const normalized = code.replace(/\r\n?/g, "\n");
    const scanned = new Scanner(normalized).run();
    if (!scanned.valid) return scanned;

    const error = firstGrammarError(normalized);
    return error ? { valid: false, error } : { valid: true };
  }
}

function firstGrammarError(src: string): SyntaxCheckFailure | undefined {
  let at: number | undefined;
  parser.parse(src).iterate({
    enter: (node) => {
      if (at !== undefined) return false;
      if (node.type.isError) {
        at = node.from;
        return false;
      }
      return undefined;
    },
  });
  if (at === undefined) return undefined;

  const before = src.slice(0, at);
  const line = before.split("\n").length;
  const column = at - (before.lastIndexOf("\n") + 1) + 1;
  return { kind: "SyntaxCheckFailure", message: "invalid syntax", line, column };
}

class Scanner {
  private i = 0;
  private line = 1;
  private lineStart = 0;

  private readonly brackets: OpenBracket[] = [];
  private readonly indents: number[] = [0];
  private atLineStart = true;
  private expectIndent = false;
  private blockLine = 0;
  private danglingContinuation = false;
  private lastSignificant = "";

  constructor(private readonly src: string) {}

  run(): SyntaxCheckResult {
    while (this.i < this.src.length) {
      const failure = this.atLineStart ? this.readIndentation() : this.readToken();
      if (failure) return { valid: false, error: failure };
    }
    const failure = this.finish();
    return failure ? { valid: false, error: failure } : { valid: true };
  }

  private column(at = this.i): number {
    return at - this.lineStart + 1;
  }

  private fail(message: string, line = this.line, column = this.column()): SyntaxCheckFailure {
    return { kind: "SyntaxCheckFailure", message, line, column };
  }

  private newline(at: number): void {
    this.line++;
    this.lineStart = at + 1;
  }

  private top(): number {
    return this.indents[this.indents.length - 1] ?? 0;
  }

  /** Measure a logical line's indentation; blank and comment-only lines are skipped. */
  private readIndentation(): SyntaxCheckFailure | undefined {
    let width = 0;
    let j = this.i;
    for (; j < this.src.length; j++) {
      const c = this.src.charAt(j);
      if (c === " ") width++;
      else if (c === "\t") width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE;
      else if (c === "\f") width = 0;
      else break;
    }

    const next = this.src.charAt(j);
    if (next === "" || next === "\n" || next === "#") {
      const end = this.src.indexOf("\n", j);
      if (end === -1) {
        this.i = this.src.length;
      } else {
        this.i = end + 1;
        this.newline(end);
      }
      return undefined;
    }

    const column = j - this.lineStart + 1;
    if (this.expectIndent) {
      if (width <= this.top()) {
        return this.fail(`expected an indented block after line ${this.blockLine}`, this.line, column);
      }
      this.indents.push(width);
      this.expectIndent = false;
    } else if (width > this.top()) {
      return this.fail("unexpected indent", this.line, column);
    } else if (width < this.top()) {
      while (this.indents.length > 1 && this.top() > width) this.indents.pop();
      if (this.top() !== width) {
        return this.fail("unindent does not match any outer indentation level", this.line, column);
      }
    }

    this.i = j;
    this.atLineStart = false;
    this.lastSignificant = "";
    return undefined;
  }

  private readToken(): SyntaxCheckFailure | undefined {
    const c = this.src.charAt(this.i);

    if (c === "#") {
      const end = this.src.indexOf("\n", this.i);
      this.i = end === -1 ? this.src.length : end;
      return undefined;
    }

    if (c === "\n") {
      if (this.brackets.length === 0) {
        this.expectIndent = this.lastSignificant === ":";
        if (this.expectIndent) this.blockLine = this.line;
        this.atLineStart = true;
      }
      this.newline(this.i);
      this.i++;
      return undefined;
    }

    if (c === "\\") {
      if (this.src.charAt(this.i + 1) !== "\n") {
        return this.fail("unexpected character after line continuation character");
      }
      this.newline(this.i + 1);
      this.i += 2;
      this.danglingContinuation = true;
      return undefined;
    }

    if (c === " " || c === "\t" || c === "\f") {
      this.i++;
      return undefined;
    }

    this.danglingContinuation = false;

    if (c === "'" || c === '"') return this.readString(c);

    if (c === "(" || c === "[" || c === "{") {
      this.brackets.push({ char: c, line: this.line, column: this.column() });
    } else if (c in CLOSER_TO_OPENER) {
      const open = this.brackets.pop();
      if (!open) return this.fail(`unmatched '${c}'`);
      if (CLOSER_TO_OPENER[c] !== open.char) {
        return this.fail(`closing parenthesis '${c}' does not match opening parenthesis '${open.char}'`);
      }
    }

    this.lastSignificant = c;
    this.i++;
    return undefined;
  }

  /** String prefixes (r, b, f, u) need no handling: a backslash never ends a literal. */
  private readString(quote: string): SyntaxCheckFailure | undefined {
    const startLine = this.line;
    const startColumn = this.column();
    const triple = quote.repeat(3);

    if (this.src.startsWith(triple, this.i)) {
      let k = this.i + 3;
      while (k < this.src.length) {
        const c = this.src.charAt(k);
        if (c === "\\") {
          if (this.src.charAt(k + 1) === "\n") this.newline(k + 1);
          k += 2;
        } else if (this.src.startsWith(triple, k)) {
          this.i = k + 3;
          this.lastSignificant = quote;
          return undefined;
        } else {
          if (c === "\n") this.newline(k);
          k++;
        }
      }
      return this.fail("unterminated triple-quoted string literal", startLine, startColumn);
    }

    let k = this.i + 1;
    for (;;) {
      const c = this.src.charAt(k);
      if (c === "" || c === "\n") {
        return this.fail("unterminated string literal", startLine, startColumn);
      }
      if (c === "\\") {
        if (this.src.charAt(k + 1) === "\n") this.newline(k + 1);
        k += 2;
        continue;
      }
      if (c === quote) break;
      k++;
    }

    this.i = k + 1;
    this.lastSignificant = quote;
    return undefined;
  }

  private finish(): SyntaxCheckFailure | undefined {
    const open = this.brackets[this.brackets.length - 1];
    if (open) return this.fail(`'${open.char}' was never closed`, open.line, open.column);

    if (this.danglingContinuation) return this.fail("unexpected EOF after line continuation");

    if (!this.atLineStart && this.lastSignificant === ":") {
      this.expectIndent = true;
      this.blockLine = this.line;
    }
    if (this.expectIndent) {
      return this.fail(`expected an indented block after line ${this.blockLine}`, this.line, this.column());
    }
    return undefined;
  }
}
