/**
 * Command line interface.
 *
 * Usage:
 *   posonly [options] <python source files and folders...>
 *   posonly --recover <archive-path>
 *
 * Every option can also be set through a POSONLY_* environment variable;
 * flags win over the environment.
 */

import color from "cli-color";
import * as path from "path";
import { Archive } from "./batch/archive";
import { runBatch } from "./batch/batch";
import { findSources } from "./batch/discover";
import type { FileOutcome } from "./batch/file";
import { optionsFromEnv, parseBoolean, parseConcurrency, parseEncoding, settingsFromEnv } from "./config/env";
import type { Env } from "./config/env";
import {
  DEFAULT_DECORATOR,
  DEFAULT_PYTHON_VERSION,
  parseIndentation,
  parseLineSeparator,
  parseManglePolicy,
  parsePythonVersion,
  validateDecorator,
} from "./config/options";
import type { ConvertOptions } from "./config/options";
import { ConversionError, OptionsError, formatConversionError, locate } from "./errors";
import { VERSION } from "./version";

export type CliOptions = {
  paths: string[];
  quiet: boolean;
  archive: boolean;
  archivePath: string;
  encoding: BufferEncoding;
  concurrency?: number;
  dryRun: boolean;
  failFast: boolean;
  convert: Partial<ConvertOptions>;
};

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "recover"; archivePath: string; quiet: boolean }
  | { kind: "run"; options: CliOptions };

export function helpText(cwd: string = process.cwd()): string {
  return `
posonly ${VERSION}: backport compiler for Python positional-only parameters

Usage:
  posonly [options] <python source files and folders...>
  posonly --recover <archive-path>

Options:
  -h, --help               Show this help
  -V, --version            Show the version
  -q, --quiet              Run in quiet mode

Archive options:
  -n, --no-archive         Do not archive original files
  -p, --archive-path PATH  Path to archive original files (${path.join(cwd, "archive")})
      --recover PATH       Restore the original files archived in PATH

Convert options:
  -c, --encoding CODING    Encoding to open source files (utf8)
  -v, --python VERSION     Convert against Python version (${DEFAULT_PYTHON_VERSION})
  -s, --linesep SEP        Line separator of generated code: LF, CRLF or CR (detected)
  -t, --indentation IND    Indentation of generated code: a width, "tab", or whitespace (detected)
  -d, --dismiss            Dismiss runtime checks for positional-only parameters
      --no-pep8            Do not add PEP 8 blank lines around the decorator definition
  -l, --lint               Verify converted code
  -r, --decorator NAME     Name of the runtime-check decorator (${DEFAULT_DECORATOR})
  -m, --mangling POLICY    Private name mangling: all, functions or none (all)
  -j, --concurrency N      Files converted at once (available parallelism)
      --dry-run            Report edits without writing files
      --fail-fast          Stop starting files after the first failure

Environment:
  POSONLY_QUIET, POSONLY_ENCODING, POSONLY_VERSION, POSONLY_LINESEP,
  POSONLY_INDENTATION, POSONLY_DISMISS, POSONLY_PEP8, POSONLY_LINT,
  POSONLY_DECORATOR, POSONLY_MANGLING, POSONLY_ARCHIVE, POSONLY_CONCURRENCY
`;
}

/**
 * Parse command line arguments. Throws OptionsError on invalid input.
 */
export function parseArgs(args: readonly string[], env: Env = process.env, cwd: string = process.cwd()): CliCommand {
  const settings = settingsFromEnv(env);
  const options: CliOptions = {
    paths: [],
    quiet: settings.quiet,
    archive: env.POSONLY_ARCHIVE ? parseBoolean("POSONLY_ARCHIVE", env.POSONLY_ARCHIVE) : true,
    archivePath: path.join(cwd, "archive"),
    encoding: settings.encoding,
    concurrency: settings.concurrency,
    dryRun: false,
    failFast: false,
    convert: optionsFromEnv(env),
  };
  let recover: string | undefined;

  let i = 0;
  const value = (flag: string, inline: string | undefined): string => {
    if (inline !== undefined) return inline;
    i++;
    if (i >= args.length) {
      throw new OptionsError(flag, "requires a value");
    }
    return args[i];
  };

  while (i < args.length) {
    const arg = args[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    switch (flag) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-V":
      case "--version":
        return { kind: "version" };
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-n":
      case "--no-archive":
        options.archive = false;
        break;
      case "-p":
      case "--archive-path":
        options.archivePath = path.resolve(cwd, value(flag, inline));
        break;
      case "--recover":
        recover = path.resolve(cwd, value(flag, inline));
        break;
      case "-c":
      case "--encoding":
        options.encoding = parseEncoding(value(flag, inline));
        break;
      case "-v":
      case "--python":
        options.convert.pythonVersion = parsePythonVersion(value(flag, inline));
        break;
      case "-s":
      case "--linesep":
        options.convert.linesep = parseLineSeparator(value(flag, inline));
        break;
      case "-t":
      case "--indentation":
        options.convert.indentation = parseIndentation(value(flag, inline));
        break;
      case "-d":
      case "--dismiss":
        options.convert.dismiss = true;
        break;
      case "--no-pep8":
        options.convert.pep8 = false;
        break;
      case "-l":
      case "--lint":
        options.convert.lint = true;
        break;
      case "-r":
      case "--decorator":
        options.convert.decorator = validateDecorator(value(flag, inline));
        break;
      case "-m":
      case "--mangling":
        options.convert.mangling = parseManglePolicy(value(flag, inline));
        break;
      case "-j":
      case "--concurrency":
        options.concurrency = parseConcurrency(value(flag, inline));
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--fail-fast":
        options.failFast = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new OptionsError(arg, "unknown option");
        }
        options.paths.push(arg);
    }
    i++;
  }

  if (recover !== undefined) {
    return { kind: "recover", archivePath: recover, quiet: options.quiet };
  }
  if (options.paths.length === 0) {
    throw new OptionsError("SOURCE", "no source files or folders given");
  }
  return { kind: "run", options };
}

function formatError(error: unknown, file: string): string {
  if (error instanceof ConversionError) {
    return formatConversionError(error);
  }
  if (error instanceof Error) {
    return `${file}: ${error.message}`;
  }
  return `${file}: Unknown error: ${String(error)}`;
}

function reportFile(outcome: FileOutcome, dryRun: boolean): void {
  if (outcome.state === "unchanged") {
    console.log(color.blackBright(`unchanged ${outcome.file}`));
    return;
  }
  const verb = dryRun ? "would convert" : "converted";
  console.log(`${color.green(verb)} ${outcome.file} ${color.blackBright(`(${outcome.edits.length} edits)`)}`);
  if (dryRun) {
    for (const edit of outcome.edits) {
      const loc = locate(outcome.source, edit.from, edit.to);
      const change = edit.from === edit.to ? `insert ${JSON.stringify(edit.text)}` : `delete ${JSON.stringify(outcome.source.slice(edit.from, edit.to))}`;
      console.log(`  ${outcome.file}:${loc.line}:${loc.column}: ${color.cyan(edit.origin)} ${change}`);
    }
  }
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(args: readonly string[], env: Env = process.env): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(args, env);
  } catch (err) {
    if (err instanceof OptionsError) {
      console.error(color.red(`Error: ${err.message}`));
      console.error("Run with --help for usage.");
      return 2;
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      console.log(helpText());
      return 0;
    case "version":
      console.log(VERSION);
      return 0;
    case "recover": {
      const restored = await new Archive(command.archivePath).recover();
      if (!command.quiet) {
        for (const entry of restored) {
          console.log(`${color.green("recovered")} ${entry.original}`);
        }
      }
      console.error(`Recovered ${restored.length} file(s) from ${command.archivePath}`);
      return 0;
    }
    case "run":
      return run(command.options);
  }
}

async function run(options: CliOptions): Promise<number> {
  const { files, missing } = await findSources(options.paths);
  for (const entry of missing) {
    console.error(color.yellow(`Warning: no such file or directory: ${entry}`));
  }
  if (files.length === 0) {
    console.error(color.red("Error: no valid source file found"));
    return 2;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error(color.yellow("Interrupted: finishing files in progress"));
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const summary = await runBatch(files, {
      convert: options.convert,
      encoding: options.encoding,
      archive: options.archive && !options.dryRun ? new Archive(options.archivePath) : undefined,
      dryRun: options.dryRun,
      concurrency: options.concurrency,
      failFast: options.failFast,
      signal: controller.signal,
      onFile: options.quiet ? undefined : (outcome) => reportFile(outcome, options.dryRun),
    });

    for (const failure of summary.failed) {
      console.error(color.red(formatError(failure.error, failure.file)));
    }
    if (!options.quiet || summary.failed.length > 0) {
      const parts = [
        `${summary.converted.length} converted`,
        `${summary.unchanged.length} unchanged`,
        `${summary.failed.length} failed`,
      ];
      if (summary.skipped.length > 0) parts.push(`${summary.skipped.length} skipped`);
      console.error(parts.join(", "));
    }
    return summary.failed.length > 0 || summary.skipped.length > 0 ? 1 : 0;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
