import type { CodeSource } from "../schemas/index.js";

export interface ExtractedCode {
  code: string;
  source: CodeSource;
  /** Fence info string, lower-cased ("python", "bash", …) */
  language?: string;
  /** Number of fenced blocks seen in the reply */
  blockCount: number;
}

interface FencedBlock {
  language?: string;
  lines: string[];
  closed: boolean;
}

const OPENING_FENCE = /^\s*(`{3,}|~{3,})\s*([^\s`]*)[^`]*$/;
const PYTHON_TAGS = new Set(["python", "py", "python3"]);

/**
 * Pull the program text out of an LLM reply.
 *
 * Picks the first block tagged python/py, else the first fenced block, else
 * the whole reply. A block left open at the end of the reply (truncated
 * output) runs to the end of the text.
 */
export function extractCode(rawText: string): ExtractedCode {
  const lines = rawText.replace(/\r\n?/g, "\n").split("\n");
  const blocks = scanFencedBlocks(lines);

  const chosen =
    blocks.find((b) => b.language !== undefined && PYTHON_TAGS.has(b.language)) ?? blocks[0];

  if (!chosen) {
    return { code: tidy(lines.join("\n")), source: "whole-text", blockCount: 0 };
  }

  return {
    code: tidy(chosen.lines.join("\n")),
    source: chosen.closed ? "fenced" : "unterminated-fence",
    language: chosen.language,
    blockCount: blocks.length,
  };
}

function scanFencedBlocks(lines: string[]): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  let i = 0;

  while (i < lines.length) {
    const match = OPENING_FENCE.exec(lines[i] ?? "");
    const fence = match?.[1];
    if (!match || !fence) {
      i++;
      continue;
    }

    const language = match[2] ? match[2].toLowerCase() : undefined;
    const body: string[] = [];
    let closed = false;
    let j = i + 1;

    for (; j < lines.length; j++) {
      const line = lines[j] ?? "";
      if (isClosingFence(line, fence)) {
        closed = true;
        break;
      }
      body.push(line);
    }

    blocks.push({ language, lines: body, closed });
    if (!closed) break;
    i = j + 1;
  }

  return blocks;
}

/** Same fence character, at least as long as the opener, nothing else. */
function isClosingFence(line: string, opener: string): boolean {
  const trimmed = line.trim();
  const fenceChar = opener.charAt(0);
  return trimmed.length >= opener.length && [...trimmed].every((c) => c === fenceChar);
}

/** Drop leading blank lines and trailing whitespace, keep first-line indentation. */
function tidy(text: string): string {
  return text.replace(/^(?:[ \t]*\n)+/, "").trimEnd();
}
