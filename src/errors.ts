/**
 * Conversion errors.
 *
 * Every failure is local to one source file and carries enough location
 * information for the caller to report it and move on.
 */

export type SourceLocation = {
  from: number;
  to: number;
  /** 1-based line of `from` */
  line: number;
  /** 0-based column of `from` */
  column: number;
};

export type ConversionErrorKind = "parse" | "malformed" | "internal";

export type ConversionNote = {
  message: string;
  loc?: SourceLocation;
};

export class ConversionError extends Error {
  kind: ConversionErrorKind;
  filename: string;
  loc?: SourceLocation;
  notes: ConversionNote[];

  constructor(
    message: string,
    kind: ConversionErrorKind,
    filename: string = "<unknown>",
    loc?: SourceLocation
  ) {
    super(message);
    this.name = "ConversionError";
    this.kind = kind;
    this.filename = filename;
    this.loc = loc;
    this.notes = [];
  }

  addNote(message: string, loc?: SourceLocation): this {
    this.notes.push({ message, loc });
    return this;
  }
}

/** The input is not valid source in the declared grammar. */
export class ParseFailure extends ConversionError {
  constructor(message: string, filename?: string, loc?: SourceLocation) {
    super(message, "parse", filename, loc);
    this.name = "ParseFailure";
  }
}

/** A positional-only marker in a position the engine cannot rewrite. */
export class MalformedConstruct extends ConversionError {
  constructor(message: string, filename?: string, loc?: SourceLocation) {
    super(message, "malformed", filename, loc);
    this.name = "MalformedConstruct";
  }
}

/**
 * A broken engine invariant (scope stack, edit overlap, unparsable output).
 * Never caused by user input.
 */
export class InternalConsistencyFault extends ConversionError {
  constructor(message: string, filename?: string, loc?: SourceLocation) {
    super(message, "internal", filename, loc);
    this.name = "InternalConsistencyFault";
  }
}

/** Invalid conversion options. */
export class OptionsError extends Error {
  option: string;

  constructor(option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = "OptionsError";
    this.option = option;
  }
}

/**
 * Compute a location for a source range.
 */
export function locate(source: string, from: number, to: number = from): SourceLocation {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < from && i < source.length; i++) {
    const ch = source[i];
    if (ch === "\n" || (ch === "\r" && source[i + 1] !== "\n")) {
      line++;
      lineStart = i + 1;
    }
  }
  return { from, to, line, column: from - lineStart };
}

/**
 * Render an error as `file:line:column: kind: message`.
 */
export function formatConversionError(error: ConversionError): string {
  const where = error.loc
    ? `${error.filename}:${error.loc.line}:${error.loc.column}`
    : error.filename;
  const lines = [`${where}: ${error.name}: ${error.message}`];
  for (const note of error.notes) {
    const noteWhere = note.loc ? `${note.loc.line}:${note.loc.column}: ` : "";
    lines.push(`  note: ${noteWhere}${note.message}`);
  }
  return lines.join("\n");
}
