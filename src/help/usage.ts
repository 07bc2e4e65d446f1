// src/help/usage.ts

import { Chalk, type ChalkInstance } from 'chalk';
import type { OptionsRegistry } from '../schema/options-registry.js';
import type { OptionField } from '../schema/types.js';

export interface UsageOptions {
  programName: string;
  description?: string;
  /** Defaults to the terminal's color support; false forces plain text. */
  color?: boolean;
}

const FLAG_COLUMN_WIDTH = 28;

function palette(color: boolean | undefined) {
  const chalk: ChalkInstance = color === false ? new Chalk({ level: 0 }) : new Chalk();
  return {
    title: chalk.bold.cyan,
    header: chalk.bold.white,
    cmd: chalk.green,
    flag: chalk.yellow,
    desc: chalk.white,
    dim: chalk.dim,
  };
}

/** e.g. "-i, --iterations <integer>" */
export function formatFlags<T extends object>(field: OptionField<T>): string {
  const [primary, short] = field.flags;
  const names = short ? `${short}, ${primary}` : primary;
  return `${names} <${field.valueType}>`;
}

/**
 * Render a usage screen for every declared option, in declaration order.
 * Defaults are read from a fresh instance.
 */
export function formatUsage<T extends object>(
  registry: OptionsRegistry<T>,
  options: UsageOptions
): string {
  const c = palette(options.color);
  const defaults = registry.createInstance();
  const sections: string[] = [];

  if (options.description) {
    sections.push(c.title(options.description));
    sections.push('');
  }

  sections.push(`${c.header('Usage:')} ${c.cmd(`${options.programName} [--flag value]...`)}`);
  sections.push('');
  sections.push(c.header('Options:'));

  for (const field of registry.fields()) {
    const defaultValue = String(defaults[field.name]);
    const defaultStr = defaultValue !== '' ? c.dim(` (default: ${defaultValue})`) : '';
    const help = field.help || field.name;
    sections.push(`  ${c.flag(formatFlags(field).padEnd(FLAG_COLUMN_WIDTH))} ${c.desc(help)}${defaultStr}`);
  }

  return sections.join('\n');
}
