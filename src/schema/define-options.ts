// src/schema/define-options.ts

import { z } from 'zod';
import { FLAG_PATTERN, OptionsRegistry } from './options-registry.js';
import type {
  OptionDeclarations,
  OptionField,
  OptionsTarget,
  Primitive,
  ValueType,
} from './types.js';
import { SchemaError } from '../utils/errors.js';

const optionSpecSchema = z
  .object({
    flag: z.string().regex(FLAG_PATTERN, 'flag must look like --name or -n'),
    short: z
      .string()
      .refine((s) => s === '' || FLAG_PATTERN.test(s), 'short flag must look like -n')
      .optional(),
    help: z.string().optional(),
    type: z.enum(['string', 'integer', 'float', 'boolean']).optional(),
  })
  .strict();

type ParsedOptionSpec = z.infer<typeof optionSpecSchema>;

function isField<T extends object>(
  instance: T,
  key: string
): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(instance, key);
}

function matchesDefault(valueType: ValueType, defaultValue: unknown): boolean {
  switch (valueType) {
    case 'string':
      return typeof defaultValue === 'string';
    case 'boolean':
      return typeof defaultValue === 'boolean';
    case 'integer':
    case 'float':
      return typeof defaultValue === 'number';
  }
}

function inferValueType(defaultValue: unknown): ValueType | undefined {
  if (typeof defaultValue === 'string') return 'string';
  if (typeof defaultValue === 'boolean') return 'boolean';
  return undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function toField<T extends object>(
  className: string,
  instance: T,
  name: string,
  spec: ParsedOptionSpec
): OptionField<T> {
  if (!isField(instance, name)) {
    throw new SchemaError(className, `'${name}' is not a field of ${className}`);
  }

  const defaultValue: unknown = instance[name];
  const valueType = spec.type ?? inferValueType(defaultValue);

  if (!valueType) {
    throw new SchemaError(
      className,
      `Option '${name}' needs an explicit type ('integer' or 'float')`
    );
  }

  if (!matchesDefault(valueType, defaultValue)) {
    throw new SchemaError(
      className,
      `Option '${name}' is declared as ${valueType} but defaults to ${typeof defaultValue}`
    );
  }

  const flags = spec.short ? [spec.flag, spec.short] : [spec.flag];
  if (spec.short === spec.flag) {
    throw new SchemaError(className, `Option '${name}' uses '${spec.flag}' as both flag and short flag`);
  }

  return Object.freeze({
    name,
    valueType,
    flags: Object.freeze(flags),
    help: spec.help ?? '',
    assign(target: T, value: Primitive): void {
      Reflect.set(target, name, value);
    },
  });
}

/**
 * Bind command-line flags to the fields of a configuration class and build
 * its registry. Call once per class, at module level.
 *
 * Fields missing from `declarations` stay plain data: they keep their
 * default and cannot be set from the command line.
 *
 * @throws SchemaError on malformed metadata, no declared options, colliding
 * flags, or a class that already has a registry
 */
export function defineOptions<T extends object>(
  target: OptionsTarget<T>,
  declarations: OptionDeclarations<T>
): OptionsRegistry<T> {
  const className = target.name || 'anonymous class';
  const defaults = new target();
  const fields: OptionField<T>[] = [];

  const entries: Array<[string, unknown]> = Object.entries(declarations);
  for (const [name, rawSpec] of entries) {
    if (rawSpec === undefined) continue;

    const parsed = optionSpecSchema.safeParse(rawSpec);
    if (!parsed.success) {
      throw new SchemaError(className, `Invalid option '${name}': ${describeIssues(parsed.error)}`);
    }

    fields.push(toField(className, defaults, name, parsed.data));
  }

  return OptionsRegistry.build(target, fields);
}
