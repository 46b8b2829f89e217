/**
 * Deck Parser
 *
 * Line-oriented card decks. Each physical line is judged on its own:
 * blank lines and `#` comments are ignored, everything else must split into
 * a non-empty question and answer on one separator. A bad line becomes an
 * issue and parsing continues with the next.
 */

// =============================================================================
// Constants
// =============================================================================

/**
 * Separators in priority order. The first one a line contains is used.
 */
export const SEPARATORS = [">>", "::", "|"] as const;

/** Display width of a line quoted in an issue */
const DISPLAY_WIDTH = 50;

const LF = 0x0a;
const CR = 0x0d;

export const INVALID_UTF8_REASON = "Invalid UTF-8 encoding";
export const NO_SEPARATOR_REASON = `No valid separator found. Expected one of: ${SEPARATORS.join(", ")}`;
export const EMPTY_QUESTION_REASON = "Empty question part";
export const EMPTY_ANSWER_REASON = "Empty answer part";

// =============================================================================
// Types
// =============================================================================

export interface ParseIssue {
  lineNumber: number;
  /** The offending line, shortened for display */
  line: string;
  reason: string;
}

export interface ParsedEntry {
  lineNumber: number;
  question: string;
  answer: string;
  /** Trimmed source line */
  line: string;
}

export type LineOutcome =
  | { kind: "card"; question: string; answer: string }
  | { kind: "ignored" }
  | { kind: "rejected"; reason: string };

export interface DeckParse {
  /** Every physical line, blanks and comments included */
  totalLines: number;
  entries: ParsedEntry[];
  issues: ParseIssue[];
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Shorten a line to at most 50 characters for display.
 */
export function truncateForDisplay(line: string): string {
  const chars = [...line];
  if (chars.length <= DISPLAY_WIDTH) {
    return line;
  }
  return chars.slice(0, DISPLAY_WIDTH - 3).join("") + "...";
}

/**
 * Split raw bytes into physical lines. `\r\n` endings are accepted and a
 * trailing newline does not produce an extra line.
 */
export function splitLines(content: Uint8Array): Uint8Array[] {
  const lines: Uint8Array[] = [];
  let start = 0;

  for (let i = 0; i <= content.length; i++) {
    if (i < content.length && content[i] !== LF) {
      continue;
    }
    if (i === content.length && start === content.length) {
      break;
    }
    const end = i > start && content[i - 1] === CR ? i - 1 : i;
    lines.push(content.subarray(start, end));
    start = i + 1;
  }

  return lines;
}

/**
 * Judge one decoded line.
 */
export function parseLine(raw: string, maxFieldLength: number): LineOutcome {
  const line = raw.trim();
  if (line === "" || line.startsWith("#")) {
    return { kind: "ignored" };
  }

  const separator = SEPARATORS.find((sep) => line.includes(sep));
  if (!separator) {
    return { kind: "rejected", reason: NO_SEPARATOR_REASON };
  }

  const parts = line.split(separator);
  if (parts.length !== 2) {
    return {
      kind: "rejected",
      reason: `Expected exactly one "${separator}" separator, found ${parts.length} parts`,
    };
  }

  const question = parts[0].trim();
  const answer = parts[1].trim();
  if (question === "") {
    return { kind: "rejected", reason: EMPTY_QUESTION_REASON };
  }
  if (answer === "") {
    return { kind: "rejected", reason: EMPTY_ANSWER_REASON };
  }
  if ([...question].length > maxFieldLength || [...answer].length > maxFieldLength) {
    return {
      kind: "rejected",
      reason: `Question or answer exceeds ${maxFieldLength} characters`,
    };
  }

  return { kind: "card", question, answer };
}

/**
 * Parse a whole deck.
 */
export function parseDeck(content: Uint8Array, maxFieldLength: number): DeckParse {
  const strict = new TextDecoder("utf-8", { fatal: true });
  const lenient = new TextDecoder("utf-8");
  const result: DeckParse = { totalLines: 0, entries: [], issues: [] };

  for (const bytes of splitLines(content)) {
    result.totalLines++;
    const lineNumber = result.totalLines;

    let text: string;
    try {
      text = strict.decode(bytes);
    } catch {
      result.issues.push({
        lineNumber,
        line: truncateForDisplay(lenient.decode(bytes).trim()),
        reason: INVALID_UTF8_REASON,
      });
      continue;
    }

    const outcome = parseLine(text, maxFieldLength);
    if (outcome.kind === "rejected") {
      result.issues.push({
        lineNumber,
        line: truncateForDisplay(text.trim()),
        reason: outcome.reason,
      });
    } else if (outcome.kind === "card") {
      result.entries.push({
        lineNumber,
        question: outcome.question,
        answer: outcome.answer,
        line: text.trim(),
      });
    }
  }

  return result;
}
