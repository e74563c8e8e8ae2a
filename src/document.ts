// src/document.ts — Line-oriented view of a document
// Documents stay plain strings at rest. Each operation re-splits them into
// lines that keep their original terminators, so untouched lines round-trip
// byte for byte.

export interface Line {
  text: string;
  /** "\n", "\r\n", or "" for an unterminated last line. */
  eol: string;
}

export interface Heading {
  level: number;
  text: string;
}

const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;

/**
 * Split text into lines, keeping each line's terminator.
 * `splitLines("")` is `[]`; a trailing newline does not produce an empty line.
 */
export function splitLines(content: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  while (start < content.length) {
    const nl = content.indexOf("\n", start);
    if (nl === -1) {
      lines.push({ text: content.slice(start), eol: "" });
      break;
    }
    const crlf = nl > start && content[nl - 1] === "\r";
    lines.push({
      text: content.slice(start, crlf ? nl - 1 : nl),
      eol: crlf ? "\r\n" : "\n",
    });
    start = nl + 1;
  }
  return lines;
}

export function joinLines(lines: readonly Line[]): string {
  return lines.map((l) => l.text + l.eol).join("");
}

/** Line terminator used by the document, "\n" when it has none. */
export function detectEol(lines: readonly Line[]): string {
  return lines.find((l) => l.eol !== "")?.eol ?? "\n";
}

/** Split fragment text into line texts, ignoring one trailing newline. */
export function fragmentLines(text: string): string[] {
  return splitLines(text).map((l) => l.text);
}

export function isBlank(line: Line): boolean {
  return line.text.trim() === "";
}

/**
 * Parse a heading line: 1–6 `#` at the start of the line, then whitespace.
 */
export function parseHeading(text: string): Heading | undefined {
  const match = HEADING_PATTERN.exec(text);
  if (!match) return undefined;
  return { level: match[1].length, text: match[2].trim() };
}

/**
 * Replace `deleteCount` lines at `start` with `texts`.
 *
 * Inserted lines use `eol`. When lines are replaced, the last new line
 * inherits the terminator of the last removed line. When inserting directly
 * after an unterminated last line, that line gets `eol` so the two do not
 * run together.
 */
export function spliceLines(
  lines: readonly Line[],
  start: number,
  deleteCount: number,
  texts: readonly string[],
  eol: string,
): Line[] {
  const inserted: Line[] = texts.map((text) => ({ text, eol }));
  const before = lines.slice(0, start);
  const after = lines.slice(start + deleteCount);

  if (deleteCount > 0 && inserted.length > 0) {
    inserted[inserted.length - 1] = {
      ...inserted[inserted.length - 1],
      eol: lines[start + deleteCount - 1].eol,
    };
  } else if (inserted.length > 0 && before.length > 0) {
    const last = before[before.length - 1];
    if (last.eol === "") before[before.length - 1] = { ...last, eol };
  }

  return [...before, ...inserted, ...after];
}

/**
 * Insert a block of lines at `index`, adding a blank separator line on each
 * side where the neighbouring line is not already blank.
 */
export function insertBlock(
  lines: readonly Line[],
  index: number,
  texts: readonly string[],
  eol: string,
): Line[] {
  const leading = index > 0 && !isBlank(lines[index - 1]) ? [""] : [];
  const trailing = index < lines.length && !isBlank(lines[index]) ? [""] : [];
  return spliceLines(lines, index, 0, [...leading, ...texts, ...trailing], eol);
}
