/**
 * Line separator and indentation detection for source files.
 */

export type LineSeparator = "\n" | "\r\n" | "\r";

/**
 * The most frequent line separator in `source`, or `fallback` when the text
 * has no line breaks. Ties go to `\n`.
 */
export function detectLineSeparator(source: string, fallback: LineSeparator = "\n"): LineSeparator {
  let lf = 0;
  let crlf = 0;
  let cr = 0;
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === "\r") {
      if (source[i + 1] === "\n") {
        crlf++;
        i++;
      } else {
        cr++;
      }
    } else if (ch === "\n") {
      lf++;
    }
  }
  if (lf === 0 && crlf === 0 && cr === 0) return fallback;
  if (lf >= crlf && lf >= cr) return "\n";
  return crlf >= cr ? "\r\n" : "\r";
}

/**
 * The indentation unit of `source`: the leading whitespace of the first
 * indented line that follows a line ending in `:`.
 */
export function detectIndentation(source: string, fallback: string = "    "): string {
  const lines = source.split(/\r\n|\r|\n/);
  let opener = false;
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    if (opener) {
      const indent = /^[ \t]*/.exec(line)?.[0] ?? "";
      if (indent !== "") return indent;
    }
    opener = /:\s*(#.*)?$/.test(line) && !/^[ \t]/.test(line);
  }
  return fallback;
}
