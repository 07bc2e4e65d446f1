// src/index.ts - public API

export { defineOptions } from './schema/define-options.js';
export { FLAG_PATTERN, OptionsRegistry } from './schema/options-registry.js';
export type {
  OptionDeclarations,
  OptionField,
  OptionSpec,
  OptionsTarget,
  Primitive,
  ValueType,
  ValueTypeFor,
} from './schema/types.js';

export { parseArguments, parseArgumentsOrThrow, parseProcessArgs } from './parser/argument-parser.js';
export { coerceValue, isValueOfType, type CoercionResult } from './parser/coerce.js';
export type { ParseOutcome } from './parser/types.js';

export {
  DEFAULT_MAX_VALUE_LENGTH,
  DEFAULT_PARSER_SETTINGS,
  resolveParserSettings,
  type OptionDefaults,
  type ParserSettings,
} from './config/settings.js';
export { DefaultsLoader } from './config/defaults-loader.js';

export { formatFlags, formatUsage, type UsageOptions } from './help/usage.js';

export {
  ArgumentError,
  CoercionError,
  ConfigurationError,
  MissingValueError,
  SchemaError,
  UnknownFlagError,
  type ArgumentErrorKind,
  type CoercionFailureReason,
} from './utils/errors.js';
export { ErrorFactory, type FlagSource, type ParseErrorDetails } from './utils/error-factory.js';
export { Logger, LogLevel, logLevelFromEnv, LOG_LEVEL_ENV } from './utils/logger.js';
