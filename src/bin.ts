#!/usr/bin/env node

// src/bin.ts - fieldflags-demo entry point

import { MIN_NODE_MAJOR, meetsNodeRequirement } from './cli/node-version.js';

if (!meetsNodeRequirement(process.version)) {
  console.error(`❌ Node.js ${MIN_NODE_MAJOR}+ required. Current: ${process.version}`);
  process.exit(1);
}

Promise.all([import('./cli/program.js'), import('./utils/logger.js')])
  .then(async ([{ runCli }, { Logger, logLevelFromEnv }]) => {
    Logger.setLevel(logLevelFromEnv());
    try {
      process.exitCode = await runCli(process.argv.slice(2));
    } catch (error) {
      Logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  })
  .catch((error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
