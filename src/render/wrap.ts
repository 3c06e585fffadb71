const TAB_SIZE = 8;

// Lines starting with these (after trimming) are left as they are
const PRESERVED_PREFIXES = ["```", "> ", "- ", "* "];

function expandTabs(line: string): string {
  let out = "";
  for (const ch of line) {
    if (ch === "\t") {
      out += " ".repeat(TAB_SIZE - (out.length % TAB_SIZE));
    } else {
      out += ch;
    }
  }
  return out;
}

function isBlank(text: string): boolean {
  return text.trim() === "";
}

const WHITESPACE = "[\\t\\n\\v\\f\\r ]";
const NON_WHITESPACE = "[^\\t\\n\\v\\f\\r ]";
const WORD_CHAR = "[\\p{L}\\p{M}\\p{N}_]";
const WORD_OR_PUNCT = `[\\p{L}\\p{M}\\p{N}_!"'&.,?]`;
const LETTER = "[\\p{L}\\p{M}_]";

// Chunks are whitespace runs, `--` dashes or words. A word also ends after a
// hyphen between letters, so `state-of-the-art` can break at each hyphen.
const WORD_SEPARATOR = new RegExp(
  `(${WHITESPACE}+` +
    `|(?<=${WORD_OR_PUNCT})-{2,}(?=${WORD_CHAR})` +
    `|${NON_WHITESPACE}+?(?:` +
    `-(?:(?<=${LETTER}{2}-)|(?<=${LETTER}-${LETTER}-))(?=${LETTER}-?${LETTER})` +
    `|(?=${WHITESPACE}|$)` +
    `|(?<=${WORD_OR_PUNCT})(?=-{2,}${WORD_CHAR})` +
    `))`,
  "u"
);

function splitChunks(text: string): string[] {
  return text.split(WORD_SEPARATOR).filter((chunk) => chunk !== "");
}

/**
 * Split an over-long chunk to fill the rest of the line, preferring to cut
 * just after the last hyphen that fits. The head may be empty when the line
 * is already full.
 */
function breakLongWord(chunks: string[], current: string[], currentLen: number, width: number): void {
  const chunk = chunks[chunks.length - 1];
  const spaceLeft = width < 1 ? 1 : width - currentLen;
  let end = spaceLeft;
  if (chunk.length > spaceLeft) {
    const hyphen = spaceLeft > 0 ? chunk.lastIndexOf("-", spaceLeft - 1) : -1;
    if (hyphen > 0 && /[^-]/.test(chunk.slice(0, hyphen))) {
      end = hyphen + 1;
    }
  }
  current.push(chunk.slice(0, end));
  chunks[chunks.length - 1] = chunk.slice(end);
}

/**
 * Greedy fill of a single line: whitespace runs are kept as separators,
 * hyphenated words may break after a hyphen, words longer than the width
 * are split, and one whitespace run at each edge of a wrapped line is
 * dropped. Leading indentation of the first line survives.
 */
export function fillLine(line: string, width: number): string {
  const text = expandTabs(line).replace(/[\n\v\f\r]/g, " ");
  // Consumed from the end
  const chunks = splitChunks(text).reverse();
  const lines: string[] = [];

  while (chunks.length > 0) {
    const current: string[] = [];
    let currentLen = 0;

    if (lines.length > 0 && isBlank(chunks[chunks.length - 1])) {
      chunks.pop();
    }

    while (chunks.length > 0) {
      const next = chunks[chunks.length - 1];
      if (currentLen + next.length > width) {
        break;
      }
      current.push(next);
      currentLen += next.length;
      chunks.pop();
    }

    if (chunks.length > 0 && chunks[chunks.length - 1].length > width) {
      breakLongWord(chunks, current, currentLen, width);
    }

    if (current.length > 0 && isBlank(current[current.length - 1])) {
      current.pop();
    }
    if (current.length > 0) {
      lines.push(current.join(""));
    }
  }

  return lines.join("\n");
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Word-wrap text line by line. Code fences, quotes and bullets pass through.
 * A non-positive width returns the text untouched.
 */
export function wrapText(text: string, width: number): string {
  if (width <= 0) {
    return text;
  }
  if (text === "") {
    return "";
  }

  return splitLines(text)
    .map((line) => {
      const trimmed = line.trim();
      return PRESERVED_PREFIXES.some((prefix) => trimmed.startsWith(prefix))
        ? line
        : fillLine(line, width);
    })
    .join("\n");
}

/**
 * Prefix every non-blank line
 */
export function indent(text: string, prefix = "  "): string {
  return text
    .split("\n")
    .map((line) => (isBlank(line) ? line : prefix + line))
    .join("\n");
}
