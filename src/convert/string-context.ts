/**
 * String-context bridge.
 *
 * Text generated inside the replacement fields of a format string must not
 * reuse the quote character that delimits that string, or older
 * interpreters would end the literal early.
 */

export type QuoteChar = "'" | '"';

export type StringDelimiter = {
  /** String prefix letters, e.g. "f" or "rf" */
  prefix: string;
  quote: QuoteChar;
  triple: boolean;
  /** Offset of the literal in the source */
  from: number;
};

const STRING_START = /^([A-Za-z]*)('''|"""|'|")/;

/**
 * Read the opening delimiter of the string literal starting at `from`.
 */
export function readDelimiter(source: string, from: number): StringDelimiter | null {
  const match = STRING_START.exec(source.slice(from, from + 8));
  if (!match) return null;
  const quote: QuoteChar = match[2][0] === '"' ? '"' : "'";
  return {
    prefix: match[1],
    quote,
    triple: match[2].length === 3,
    from,
  };
}

/**
 * Pick the quote character for names generated inside the given format
 * strings. Returns null when every character would close an enclosing
 * literal.
 *
 * A character used only by triple-quoted delimiters is still usable: a
 * lone quote does not end a triple-quoted literal.
 */
export function chooseQuote(
  delimiters: readonly StringDelimiter[],
  preferred: QuoteChar = "'"
): QuoteChar | null {
  const other: QuoteChar = preferred === "'" ? '"' : "'";
  const used = (quote: QuoteChar) => delimiters.some((d) => d.quote === quote);
  const blocked = (quote: QuoteChar) => delimiters.some((d) => d.quote === quote && !d.triple);

  if (!used(preferred)) return preferred;
  if (!used(other)) return other;
  if (!blocked(preferred)) return preferred;
  if (!blocked(other)) return other;
  return null;
}

/**
 * Quote an identifier as a Python string literal. Identifiers never contain
 * quotes or backslashes, so no escaping is needed.
 */
export function quoteName(name: string, quote: QuoteChar): string {
  return `${quote}${name}${quote}`;
}
