export type { ConvertOptions, ManglePolicy, PythonVersion } from "./options";
export {
  PYTHON_VERSIONS,
  DEFAULT_DECORATOR,
  DEFAULT_PYTHON_VERSION,
  resolveOptions,
  parseIndentation,
  parseLineSeparator,
  parsePythonVersion,
  parseManglePolicy,
  validateDecorator,
} from "./options";
export type { LineSeparator } from "./detect";
export { detectIndentation, detectLineSeparator } from "./detect";
export type { Env, RunSettings } from "./env";
export {
  optionsFromEnv,
  settingsFromEnv,
  parseBoolean,
  parseEncoding,
  parseConcurrency,
} from "./env";
