// src/config/defaults-loader.ts

import * as fs from 'fs/promises';
import * as YAML from 'yaml';
import type { OptionsRegistry } from '../schema/options-registry.js';
import type { OptionField, Primitive } from '../schema/types.js';
import type { OptionDefaults } from './settings.js';
import { coerceValue } from '../parser/coerce.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace plain number and boolean scalars of a top-level mapping with their
 * source text, so `filename: 007` stays "007" and numbers use the
 * command-line grammar.
 */
function withScalarSource(document: { contents: unknown; toJS(): unknown }): unknown {
  const parsed: unknown = document.toJS();
  if (!isRecord(parsed) || !YAML.isMap(document.contents)) {
    return parsed;
  }

  for (const { key, value } of document.contents.items) {
    if (!YAML.isScalar(key) || !YAML.isScalar(value)) continue;
    if (typeof value.value !== 'number' && typeof value.value !== 'boolean') continue;
    if (value.source !== undefined) {
      parsed[String(key.value)] = value.source;
    }
  }

  return parsed;
}

/**
 * Loads option defaults from a YAML file of `fieldName: value` pairs.
 *
 * Values go through the same coercion as command-line values, starting from
 * their source text. A missing file means no defaults.
 */
export class DefaultsLoader<T extends object> {
  constructor(private registry: OptionsRegistry<T>) {}

  async load(filePath: string): Promise<OptionDefaults> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        Logger.debug(`No defaults file at ${filePath}, using class defaults`);
        return new Map();
      }
      throw error;
    }

    const document = YAML.parseDocument(content);
    const [parseError] = document.errors;
    if (parseError) {
      throw new ConfigurationError(`Failed to parse defaults file ${filePath}: ${parseError.message}`);
    }

    return this.fromObject(withScalarSource(document) ?? {}, filePath);
  }

  /**
   * Validate an already parsed document.
   *
   * @throws ConfigurationError on unknown fields or values that do not coerce
   */
  fromObject(document: unknown, source = 'defaults'): OptionDefaults {
    if (!isRecord(document)) {
      throw new ConfigurationError(`${source}: expected a mapping of field names to values`);
    }

    const byName = new Map<string, OptionField<T>>(this.registry.fields().map((field) => [field.name, field] as const));
    const defaults = new Map<string, Primitive>();

    for (const [name, value] of Object.entries(document)) {
      const field = byName.get(name);
      if (!field) {
        throw new ConfigurationError(
          `${source}: '${name}' is not an option of ${this.registry.className}`
        );
      }

      if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
        throw new ConfigurationError(`${source}: '${name}' must be a scalar value`);
      }

      const coerced = coerceValue(field.valueType, String(value));
      if (!coerced.success) {
        throw new ConfigurationError(`${source}: '${name}' ${coerced.reason}`);
      }

      defaults.set(name, coerced.value);
    }

    Logger.debug(`Loaded ${defaults.size} default(s) from ${source}`);
    return defaults;
  }
}
