// src/parser/coerce.ts

import { z } from 'zod';
import type { Primitive, ValueType } from '../schema/types.js';

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

const integerSchema = z
  .string()
  .regex(/^[+-]?\d+$/, 'expected a whole number')
  .transform(Number)
  .pipe(z.number().safe('outside the safe integer range'));

const floatSchema = z
  .string()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/, 'expected a decimal number')
  .transform(Number)
  .pipe(z.number().finite('number is out of range'));

const booleanSchema = z
  .string()
  .transform((raw) => raw.toLowerCase())
  .refine((word) => TRUE_WORDS.includes(word) || FALSE_WORDS.includes(word), {
    message: `expected one of ${[...TRUE_WORDS, ...FALSE_WORDS].join(', ')}`,
  })
  .transform((word) => TRUE_WORDS.includes(word));

const VALUE_SCHEMAS: Record<ValueType, z.ZodType<Primitive, z.ZodTypeDef, string>> = {
  string: z.string(),
  integer: integerSchema,
  float: floatSchema,
  boolean: booleanSchema,
};

export type CoercionResult =
  | { success: true; value: Primitive }
  | { success: false; reason: string };

/**
 * Convert one raw argument string into `valueType`.
 * Never throws; the failure carries the first validation message.
 */
export function coerceValue(valueType: ValueType, raw: string): CoercionResult {
  const result = VALUE_SCHEMAS[valueType].safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, reason: result.error.issues[0]?.message ?? 'invalid value' };
}

/** Whether an already typed value may be stored in a field of `valueType`. */
export function isValueOfType(valueType: ValueType, value: Primitive): boolean {
  switch (valueType) {
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
    case 'integer':
      return Number.isSafeInteger(value);
    case 'float':
      return Number.isFinite(value);
  }
}
