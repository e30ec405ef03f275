#!/usr/bin/env -S node --import tsx

/**
 * opsbridge CLI entrypoint.
 */

import { CommanderError } from 'commander';
import { loadEnvFile } from '@opsbridge/core';
import { normalizeArgv } from './argv.js';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, toExitCode, usageError } from './errors.js';
import { outputOptionsFromCommand, printError } from './output.js';
import { createProgram } from './program.js';

const QUIET_EXITS = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

async function main(): Promise<void> {
  loadEnvFile();
  const program = createProgram();
  try {
    await program.parseAsync(normalizeArgv(process.argv));
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // exitOverride turns usage and validation failures into CommanderError
    if (error instanceof CommanderError) {
      if (QUIET_EXITS.has(error.code)) {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
