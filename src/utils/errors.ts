// src/utils/errors.ts

import type { ValueType } from '../schema/types.js';

/**
 * A configuration class was declared in a way no parser can be built from:
 * no options, colliding flags, malformed flag metadata.
 * Raised while the registry is built, never while parsing.
 */
export class SchemaError extends Error {
  constructor(
    public className: string,
    message: string
  ) {
    super(`[${className}] ${message}`);
    this.name = 'SchemaError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ArgumentErrorKind = 'unknown-flag' | 'missing-value' | 'coercion';

/**
 * Base class for every failure caused by the argument list itself.
 * `position` is the index of `token` within the argument list.
 */
export abstract class ArgumentError extends Error {
  abstract readonly kind: ArgumentErrorKind;

  constructor(
    public readonly token: string,
    public readonly position: number,
    message: string
  ) {
    super(message);
  }
}

export class UnknownFlagError extends ArgumentError {
  readonly kind = 'unknown-flag' as const;

  constructor(public readonly flag: string, position: number) {
    super(flag, position, `Unrecognized flag '${flag}' at position ${position}`);
    this.name = 'UnknownFlagError';
  }
}

export class MissingValueError extends ArgumentError {
  readonly kind = 'missing-value' as const;

  constructor(public readonly flag: string, position: number) {
    super(flag, position, `Missing value for flag '${flag}' at position ${position}`);
    this.name = 'MissingValueError';
  }
}

export type CoercionFailureReason = 'invalid' | 'too-long';

export class CoercionError extends ArgumentError {
  readonly kind = 'coercion' as const;

  constructor(
    public readonly field: string,
    public readonly value: string,
    public readonly valueType: ValueType,
    position: number,
    public readonly reason: CoercionFailureReason = 'invalid',
    detail?: string
  ) {
    super(
      value,
      position,
      reason === 'too-long'
        ? `Value for '${field}' at position ${position} exceeds the maximum length`
        : `Cannot read '${value}' as ${valueType} for '${field}'${detail ? `: ${detail}` : ''}`
    );
    this.name = 'CoercionError';
  }
}
