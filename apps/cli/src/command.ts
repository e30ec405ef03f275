import type { Command } from 'commander';
import {
  ConfluenceTools,
  JiraTools,
  loadRedshiftConfig,
  redshiftConnectionFactory,
  type ConnectionFactory,
} from '@opsbridge/core';
import { toExitCode, usageError } from './errors.js';
import { outputOptionsFromCommand, printError, type OutputOptions } from './output.js';

/**
 * Service clients, built lazily so a command only needs the configuration
 * of the service it talks to.
 */
export interface CliServices {
  jira(): JiraTools;
  confluence(onWarning: (message: string) => void): ConfluenceTools;
  redshift(): ConnectionFactory;
}

export const envServices: CliServices = {
  jira: () => JiraTools.fromEnv(),
  confluence: (onWarning) => ConfluenceTools.fromEnv(undefined, { onWarning }),
  redshift: () => redshiftConnectionFactory(loadRedshiftConfig()),
};

// ── Helpers ──────────────────────────────────────────────────────────

export async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

export function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

export function parseChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw usageError(`Invalid ${flag} "${value}". Expected one of: ${choices.join(', ')}.`);
  }
  return match;
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw usageError(`Invalid ${flag} "${value}". Expected a positive integer.`);
  }
  return parsed;
}
