// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';
import { z } from 'zod';

import { demoRegistry } from './demo-options.js';
import { DefaultsLoader } from '../config/defaults-loader.js';
import { parseArguments } from '../parser/argument-parser.js';
import { formatUsage } from '../help/usage.js';
import { ErrorFactory } from '../utils/error-factory.js';
import { Logger } from '../utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_PARSE_FAILURE = 2;

const packageSchema = z.object({ version: z.string() });

async function readVersion(): Promise<string> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg = packageSchema.parse(JSON.parse(await fs.readFile(pkgPath, 'utf-8')));
  return pkg.version;
}

function printUsage(color?: boolean): void {
  console.log(formatUsage(demoRegistry, {
    programName: 'fieldflags-demo parse --',
    description: 'Parse flag/value pairs into the demo configuration',
    color,
  }));
}

/**
 * Build the demo program. Everything after `--` in `parse` goes to the option
 * parser unchanged.
 */
export async function createProgram(onExitCode: (code: number) => void): Promise<Command> {
  const program = new Command();

  program
    .name('fieldflags-demo')
    .version(`fieldflags-demo v${await readVersion()}`, '-v, --version')
    .description('Declarative flag parsing demo')
    .exitOverride();

  program
    .command('parse')
    .description('Parse flag/value pairs and print the resulting configuration as JSON')
    .argument('[args...]', 'Flag/value pairs, after --')
    .option('--defaults <file>', 'YAML file of field defaults')
    .option('--no-color', 'Plain usage output')
    .action(async (args: string[], opts: { defaults?: string; color: boolean }) => {
      const defaults = opts.defaults
        ? await new DefaultsLoader(demoRegistry).load(opts.defaults)
        : undefined;

      const outcome = parseArguments(demoRegistry, args, { defaults });
      if (!outcome.success) {
        const details = ErrorFactory.describe(outcome.error, demoRegistry);
        Logger.error(details.message);
        if (details.suggestion) {
          Logger.info(details.suggestion);
        }
        onExitCode(EXIT_PARSE_FAILURE);
        return;
      }

      if (outcome.options.help) {
        printUsage(opts.color);
        return;
      }

      console.log(JSON.stringify(outcome.options, null, 2));
    });

  program
    .command('usage')
    .description('Print the usage text of the demo options')
    .option('--no-color', 'Plain output')
    .action((opts: { color: boolean }) => {
      printUsage(opts.color);
    });

  return program;
}

/**
 * Run the demo against `argv` (without the runtime and script entries) and
 * return the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  let exitCode = EXIT_OK;
  const program = await createProgram((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const details = ErrorFactory.describe(error);
    Logger.error(details.message);
    return EXIT_ERROR;
  }

  return exitCode;
}
