// src/parser/argument-parser.ts

import type { OptionsRegistry } from '../schema/options-registry.js';
import type { OptionField } from '../schema/types.js';
import type { ParseOutcome } from './types.js';
import { coerceValue, isValueOfType } from './coerce.js';
import {
  resolveParserSettings,
  type OptionDefaults,
  type ParserSettings,
} from '../config/settings.js';
import {
  ArgumentError,
  CoercionError,
  ConfigurationError,
  MissingValueError,
  UnknownFlagError,
} from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * Parse a flat `flag value flag value ...` list into a fresh configuration
 * instance.
 *
 * The list is consumed in non-overlapping pairs. The walk stops at the first
 * unknown flag, flag without a value, or value that does not coerce to its
 * field's type. A flag given twice keeps its last value.
 *
 * @param args - Arguments without the program name
 * @throws ConfigurationError on invalid settings, including defaults that
 * name no option or do not fit the option's type
 */
export function parseArguments<T extends object>(
  registry: OptionsRegistry<T>,
  args: readonly string[],
  settings: Partial<ParserSettings> = {}
): ParseOutcome<T> {
  const { maxValueLength, defaults } = resolveParserSettings(settings);
  const options = registry.createInstance();

  if (defaults) {
    applyDefaults(registry, options, defaults, maxValueLength);
  }

  for (let i = 0; i < args.length; i += 2) {
    const flag = args[i];

    if (!registry.contains(flag)) {
      return fail(new UnknownFlagError(flag, i));
    }

    if (i + 1 >= args.length) {
      return fail(new MissingValueError(flag, i));
    }

    const raw = args[i + 1];
    const field = registry.resolve(flag);

    if (raw.length > maxValueLength) {
      return fail(new CoercionError(field.name, raw.slice(0, maxValueLength), field.valueType, i + 1, 'too-long'));
    }

    const coerced = coerceValue(field.valueType, raw);
    if (!coerced.success) {
      return fail(new CoercionError(field.name, raw, field.valueType, i + 1, 'invalid', coerced.reason));
    }

    field.assign(options, coerced.value);
  }

  Logger.debug(`Parsed ${args.length / 2} option(s) for ${registry.className}`);
  return { success: true, options };
}

function applyDefaults<T extends object>(
  registry: OptionsRegistry<T>,
  options: T,
  defaults: OptionDefaults,
  maxValueLength: number
): void {
  const byName = new Map<string, OptionField<T>>(registry.fields().map((field) => [field.name, field] as const));

  for (const [name, value] of defaults) {
    const field = byName.get(name);
    if (!field) {
      throw new ConfigurationError(`Default '${name}' is not an option of ${registry.className}`);
    }
    if (!isValueOfType(field.valueType, value)) {
      throw new ConfigurationError(
        `Default for '${name}' must be ${field.valueType}, got ${JSON.stringify(value)}`
      );
    }
    if (typeof value === 'string' && value.length > maxValueLength) {
      throw new ConfigurationError(`Default for '${name}' exceeds the maximum length of ${maxValueLength}`);
    }
    field.assign(options, value);
  }
}

function fail<T>(error: ArgumentError): ParseOutcome<T> {
  Logger.debug(`Parse failed (${error.kind}): ${error.message}`);
  return { success: false, error };
}

/**
 * Same as {@link parseArguments} but throws the failure.
 *
 * @throws ArgumentError
 */
export function parseArgumentsOrThrow<T extends object>(
  registry: OptionsRegistry<T>,
  args: readonly string[],
  settings: Partial<ParserSettings> = {}
): T {
  const outcome = parseArguments(registry, args, settings);
  if (!outcome.success) {
    throw outcome.error;
  }
  return outcome.options;
}

/**
 * Parse `process.argv`-shaped input: the runtime and script entries are skipped.
 */
export function parseProcessArgs<T extends object>(
  registry: OptionsRegistry<T>,
  argv: readonly string[] = process.argv,
  settings: Partial<ParserSettings> = {}
): ParseOutcome<T> {
  return parseArguments(registry, argv.slice(2), settings);
}
