/**
 * Backport compiler for Python positional-only parameters.
 */

// Engine
export {
  convert,
  convertSource,
  verifyOutput,
  renderDecoratorDefinition,
  renderDecoratorCall,
  EditSet,
  ScopeStack,
  mangle,
} from "./convert";
export type {
  ConversionResult,
  ConversionState,
  DefinitionInsertion,
  Edit,
  EditOrigin,
  Extraction,
  ScopeContext,
  ScopeKind,
} from "./convert";

// Options
export {
  resolveOptions,
  optionsFromEnv,
  settingsFromEnv,
  detectIndentation,
  detectLineSeparator,
  DEFAULT_DECORATOR,
  PYTHON_VERSIONS,
} from "./config";
export type { ConvertOptions, ManglePolicy, PythonVersion, LineSeparator, RunSettings } from "./config";

// Errors
export {
  ConversionError,
  ParseFailure,
  MalformedConstruct,
  InternalConsistencyFault,
  OptionsError,
  formatConversionError,
} from "./errors";
export type { ConversionErrorKind, SourceLocation } from "./errors";

// Batch pipeline
export { findSources, Archive, runPool, convertFile, runBatch } from "./batch";
export type { ArchiveEntry, BatchOptions, BatchSummary, FileOutcome } from "./batch";

export { VERSION } from "./version";
