/**
 * Conversion options.
 */

import { OptionsError } from "../errors";
import { detectIndentation, detectLineSeparator } from "./detect";
import type { LineSeparator } from "./detect";

/** Grammar versions the converter accepts as input. */
export const PYTHON_VERSIONS = ["3.8", "3.9", "3.10", "3.11", "3.12"] as const;

export type PythonVersion = (typeof PYTHON_VERSIONS)[number];

/**
 * Which generated decorator calls apply class-private name mangling.
 *
 * - "all": functions and lambdas anywhere inside a class body
 * - "functions": function definitions only
 * - "none": never
 */
export type ManglePolicy = "all" | "functions" | "none";

export type ConvertOptions = {
  /** Indentation unit of the generated decorator definition */
  indentation: string;
  /** Line separator of generated lines */
  linesep: LineSeparator;
  /** Keep PEP 8 blank lines around the decorator definition */
  pep8: boolean;
  /** Source name, used in diagnostics only */
  filename: string;
  /** Grammar version of the input */
  pythonVersion: PythonVersion;
  /** Identifier of the runtime-check decorator */
  decorator: string;
  /** Strip markers without generating runtime checks */
  dismiss: boolean;
  /** Re-parse and verify the converted text */
  lint: boolean;
  mangling: ManglePolicy;
};

export const DEFAULT_DECORATOR = "__posonly_decorator";
export const DEFAULT_PYTHON_VERSION: PythonVersion = "3.12";

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u;

const PYTHON_KEYWORDS = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await", "break",
  "class", "continue", "def", "del", "elif", "else", "except", "finally",
  "for", "from", "global", "if", "import", "in", "is", "lambda", "nonlocal",
  "not", "or", "pass", "raise", "return", "try", "while", "with", "yield",
]);

const LINESEP_ALIASES: Record<string, LineSeparator> = {
  "\n": "\n",
  "\r\n": "\r\n",
  "\r": "\r",
  lf: "\n",
  crlf: "\r\n",
  cr: "\r",
  "\\n": "\n",
  "\\r\\n": "\r\n",
  "\\r": "\r",
};

export function parseLineSeparator(value: string): LineSeparator {
  const sep = LINESEP_ALIASES[value.toLowerCase()];
  if (sep === undefined) {
    throw new OptionsError("linesep", `invalid line separator ${JSON.stringify(value)}`);
  }
  return sep;
}

/**
 * Accepts whitespace, a number of spaces ("4"), or "tab".
 */
export function parseIndentation(value: string): string {
  if (/^\d+$/.test(value)) {
    const width = Number(value);
    if (width < 1) throw new OptionsError("indentation", "width must be positive");
    return " ".repeat(width);
  }
  if (value.toLowerCase() === "tab" || value === "\\t") return "\t";
  if (value === "" || !/^[ \t]+$/.test(value)) {
    throw new OptionsError("indentation", `invalid indentation ${JSON.stringify(value)}`);
  }
  return value;
}

export function parsePythonVersion(value: string): PythonVersion {
  const version = PYTHON_VERSIONS.find((v) => v === value);
  if (version === undefined) {
    throw new OptionsError(
      "pythonVersion",
      `unsupported version ${JSON.stringify(value)} (expected one of ${PYTHON_VERSIONS.join(", ")})`
    );
  }
  return version;
}

export function parseManglePolicy(value: string): ManglePolicy {
  if (value === "all" || value === "functions" || value === "none") return value;
  throw new OptionsError("mangling", `invalid policy ${JSON.stringify(value)}`);
}

export function validateDecorator(value: string): string {
  if (!IDENTIFIER.test(value) || PYTHON_KEYWORDS.has(value)) {
    throw new OptionsError("decorator", `${JSON.stringify(value)} is not a Python identifier`);
  }
  return value;
}

/**
 * Merge caller options with defaults and validate the result.
 *
 * When no line separator or indentation is given they are detected from
 * `source`.
 */
export function resolveOptions(
  options: Partial<ConvertOptions> = {},
  source: string = ""
): Readonly<ConvertOptions> {
  return Object.freeze({
    indentation: parseIndentation(options.indentation ?? detectIndentation(source)),
    linesep: parseLineSeparator(options.linesep ?? detectLineSeparator(source)),
    pep8: options.pep8 ?? true,
    filename: options.filename ?? "<unknown>",
    pythonVersion: parsePythonVersion(options.pythonVersion ?? DEFAULT_PYTHON_VERSION),
    decorator: validateDecorator(options.decorator ?? DEFAULT_DECORATOR),
    dismiss: options.dismiss ?? false,
    lint: options.lint ?? false,
    mangling: parseManglePolicy(options.mangling ?? "all"),
  });
}
