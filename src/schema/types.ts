// src/schema/types.ts

/**
 * Semantic type a raw argument string is coerced to before it is written
 * into a configuration field.
 */
export type ValueType = 'string' | 'integer' | 'float' | 'boolean';

export type Primitive = string | number | boolean;

/**
 * Value types a field of type `V` may be declared with.
 * Numbers have to choose between integer and float; strings and booleans
 * have exactly one.
 */
export type ValueTypeFor<V> = [V] extends [string]
  ? 'string'
  : [V] extends [boolean]
    ? 'boolean'
    : [V] extends [number]
      ? 'integer' | 'float'
      : never;

interface OptionSpecBase {
  flag: string;          // Primary flag, e.g. "--filename"
  short?: string;        // Optional short flag, e.g. "-f"
  help?: string;         // Shown in usage output only
}

/**
 * Option metadata attached to one field.
 * `type` is mandatory for number fields and inferred from the default otherwise.
 */
export type OptionSpec<V> = [V] extends [number]
  ? OptionSpecBase & { type: 'integer' | 'float' }
  : OptionSpecBase & { type?: ValueTypeFor<V> };

/**
 * Per-field option metadata for a configuration class.
 * Fields left out are plain data and cannot be set from the command line.
 */
export type OptionDeclarations<T> = {
  [K in keyof T]?: T[K] extends Primitive ? OptionSpec<T[K]> : never;
};

/** A configuration class: every field is default-initialised by its constructor. */
export type OptionsTarget<T extends object> = new () => T;

/**
 * One bindable option of a configuration class.
 */
export interface OptionField<T extends object> {
  readonly name: Extract<keyof T, string>;
  readonly valueType: ValueType;
  /** Primary flag first, then the short flag when one is declared. */
  readonly flags: readonly string[];
  readonly help: string;
  /** Writes an already coerced value into the field of `instance`. */
  assign(instance: T, value: Primitive): void;
}
