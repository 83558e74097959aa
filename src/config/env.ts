/**
 * Option resolution from `POSONLY_*` environment variables.
 */

import { OptionsError } from "../errors";
import type { ConvertOptions } from "./options";
import {
  parseIndentation,
  parseLineSeparator,
  parseManglePolicy,
  parsePythonVersion,
  validateDecorator,
} from "./options";

export type Env = Record<string, string | undefined>;

const BOOLEAN_STATES: Record<string, boolean> = {
  "1": true,
  "0": false,
  yes: true,
  no: false,
  true: true,
  false: false,
  on: true,
  off: false,
};

export function parseBoolean(name: string, value: string): boolean {
  const state = BOOLEAN_STATES[value.trim().toLowerCase()];
  if (state === undefined) {
    throw new OptionsError(name, `invalid boolean ${JSON.stringify(value)}`);
  }
  return state;
}

/** Batch-level settings that do not reach the engine. */
export type RunSettings = {
  quiet: boolean;
  encoding: BufferEncoding;
  concurrency?: number;
};

const ENCODINGS: readonly BufferEncoding[] = [
  "ascii",
  "utf8",
  "utf-8",
  "utf16le",
  "ucs2",
  "ucs-2",
  "latin1",
  "binary",
];

export function parseEncoding(value: string): BufferEncoding {
  const encoding = ENCODINGS.find((e) => e === value.toLowerCase());
  if (encoding === undefined) {
    throw new OptionsError("encoding", `unsupported encoding ${JSON.stringify(value)}`);
  }
  return encoding;
}

export function parseConcurrency(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new OptionsError("concurrency", `expected a positive integer, got ${JSON.stringify(value)}`);
  }
  return Number(value);
}

/**
 * Engine options set through the environment. Unset variables are left out
 * so that defaults (and detection) still apply.
 */
export function optionsFromEnv(env: Env = process.env): Partial<ConvertOptions> {
  const options: Partial<ConvertOptions> = {};
  const get = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === "" ? undefined : value;
  };

  const indentation = get("POSONLY_INDENTATION");
  if (indentation !== undefined) options.indentation = parseIndentation(indentation);
  const linesep = get("POSONLY_LINESEP");
  if (linesep !== undefined) options.linesep = parseLineSeparator(linesep);
  const pep8 = get("POSONLY_PEP8");
  if (pep8 !== undefined) options.pep8 = parseBoolean("POSONLY_PEP8", pep8);
  const version = get("POSONLY_VERSION");
  if (version !== undefined) options.pythonVersion = parsePythonVersion(version);
  const decorator = get("POSONLY_DECORATOR");
  if (decorator !== undefined) options.decorator = validateDecorator(decorator);
  const dismiss = get("POSONLY_DISMISS");
  if (dismiss !== undefined) options.dismiss = parseBoolean("POSONLY_DISMISS", dismiss);
  const lint = get("POSONLY_LINT");
  if (lint !== undefined) options.lint = parseBoolean("POSONLY_LINT", lint);
  const mangling = get("POSONLY_MANGLING");
  if (mangling !== undefined) options.mangling = parseManglePolicy(mangling);

  return options;
}

export function settingsFromEnv(env: Env = process.env): RunSettings {
  const quiet = env.POSONLY_QUIET;
  const encoding = env.POSONLY_ENCODING;
  const concurrency = env.POSONLY_CONCURRENCY;
  return {
    quiet: quiet ? parseBoolean("POSONLY_QUIET", quiet) : false,
    encoding: encoding ? parseEncoding(encoding) : "utf8",
    concurrency: concurrency ? parseConcurrency(concurrency) : undefined,
  };
}
