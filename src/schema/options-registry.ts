// src/schema/options-registry.ts

import type { OptionField, OptionsTarget } from './types.js';
import { SchemaError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/** A primary or short flag: `--name` or `-n`, no whitespace or `=`. */
export const FLAG_PATTERN = /^--?[^-\s][^\s=]*$/;

/**
 * Immutable flag -> field mapping for one configuration class.
 *
 * A registry is built once per class by {@link defineOptions} and then shared
 * read-only by every parse of that class. Building it a second time for the
 * same class is rejected.
 *
 * @example
 * ```typescript
 * const registry = defineOptions(CliOptions, {
 *   filename: { flag: '--filename' },
 *   iterations: { flag: '--iterations', short: '-i', type: 'integer' },
 * });
 *
 * registry.contains('-i');           // true
 * registry.resolve('-i').name;       // 'iterations'
 * ```
 */
export class OptionsRegistry<T extends object> {
  private static builtFor = new WeakSet<OptionsTarget<object>>();

  private readonly byFlag: ReadonlyMap<string, OptionField<T>>;
  private readonly declared: readonly OptionField<T>[];

  private constructor(
    private readonly target: OptionsTarget<T>,
    fields: readonly OptionField<T>[]
  ) {
    const className = target.name || 'anonymous class';

    if (fields.length === 0) {
      throw new SchemaError(className, 'No options declared. A parser needs at least one flag.');
    }

    const byFlag = new Map<string, OptionField<T>>();
    for (const field of fields) {
      if (field.flags.length === 0 || field.flags.length > 2) {
        throw new SchemaError(
          className,
          `Option '${field.name}' needs one flag and at most one short flag, got ${field.flags.length}`
        );
      }

      for (const flag of field.flags) {
        if (!FLAG_PATTERN.test(flag)) {
          throw new SchemaError(className, `Option '${field.name}' has malformed flag '${flag}'`);
        }

        const owner = byFlag.get(flag);
        if (owner) {
          throw new SchemaError(
            className,
            `Flag '${flag}' is declared by both '${owner.name}' and '${field.name}'`
          );
        }
        byFlag.set(flag, field);
      }
    }

    this.byFlag = byFlag;
    this.declared = Object.freeze([...fields]);
  }

  /**
   * Build the registry for `target`.
   *
   * @throws SchemaError if `target` already has a registry, declares no
   * options, has an option without a well-formed flag, or two options claim
   * the same flag
   */
  static build<T extends object>(
    target: OptionsTarget<T>,
    fields: readonly OptionField<T>[]
  ): OptionsRegistry<T> {
    if (this.builtFor.has(target)) {
      throw new SchemaError(
        target.name || 'anonymous class',
        'Options are already defined for this class. Reuse the existing registry.'
      );
    }

    const registry = new OptionsRegistry(target, fields);
    this.builtFor.add(target);

    Logger.debug(
      `Registered ${registry.byFlag.size} flag(s) for ${registry.declared.length} option(s) of ${registry.className}`
    );
    Object.freeze(registry);
    return registry;
  }

  /** Whether options have already been defined for `target`. */
  static isDefined(target: OptionsTarget<object>): boolean {
    return this.builtFor.has(target);
  }

  get className(): string {
    return this.target.name || 'anonymous class';
  }

  contains(flag: string): boolean {
    return this.byFlag.has(flag);
  }

  /**
   * Look up the field bound to `flag`.
   * Callers are expected to check {@link contains} first.
   *
   * @throws Error if `flag` is not registered
   */
  resolve(flag: string): OptionField<T> {
    const field = this.byFlag.get(flag);

    if (!field) {
      throw new Error(
        `Flag '${flag}' is not registered for ${this.className}. ` +
        `Registered flags: ${this.flags().join(', ')}`
      );
    }

    return field;
  }

  /** Declared options in declaration order. */
  fields(): readonly OptionField<T>[] {
    return this.declared;
  }

  /** Every registered flag string, primary and short. */
  flags(): readonly string[] {
    return Array.from(this.byFlag.keys());
  }

  /** A fresh, default-initialised configuration instance. */
  createInstance(): T {
    return new this.target();
  }
}
