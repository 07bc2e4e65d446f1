// src/config/settings.ts

import type { Primitive } from '../schema/types.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * Field defaults applied to a fresh instance before the argument list is
 * walked, keyed by field name. Usually produced by the defaults loader.
 */
export type OptionDefaults = ReadonlyMap<string, Primitive>;

export interface ParserSettings {
  maxValueLength: number;         // Longer values are rejected without being coerced
  defaults?: OptionDefaults;
}

export const DEFAULT_MAX_VALUE_LENGTH = 128;

export const DEFAULT_PARSER_SETTINGS: Readonly<ParserSettings> = Object.freeze({
  maxValueLength: DEFAULT_MAX_VALUE_LENGTH,
});

/**
 * Merge caller overrides over the defaults.
 *
 * @throws ConfigurationError if maxValueLength is not a positive integer
 */
export function resolveParserSettings(overrides: Partial<ParserSettings> = {}): ParserSettings {
  const settings: ParserSettings = {
    maxValueLength: overrides.maxValueLength ?? DEFAULT_PARSER_SETTINGS.maxValueLength,
    defaults: overrides.defaults,
  };

  if (!Number.isInteger(settings.maxValueLength) || settings.maxValueLength < 1) {
    throw new ConfigurationError(
      `maxValueLength must be a positive integer, got ${settings.maxValueLength}`
    );
  }

  return settings;
}
