import type { Command } from 'commander';
import { formatTable } from './util/table.js';
import { formatFlatText } from './util/text.js';
import { CliError, toCliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

/** Progress and diagnostic text; stderr so stdout stays parseable. */
export function printDiagnostic(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.error(message);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Record<string, unknown>[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const mapped = toCliError(error);
  const isCliError = mapped instanceof CliError;
  const message = isCliError ? mapped.message : mapped instanceof Error ? mapped.message : String(mapped);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? mapped.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? mapped.details ?? null
        : mapped instanceof Error
          ? { stack: mapped.stack }
          : { raw: String(mapped) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (isCliError && mapped.details !== undefined) {
      console.error('Details:', JSON.stringify(mapped.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

/**
 * JSON envelope under --json, flat `key: value` text otherwise. Empty lists
 * print a placeholder line.
 */
export function printResult(value: unknown, output: OutputOptions, emptyMessage = '(no results)'): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (Array.isArray(value) && value.length === 0) {
    printHuman(emptyMessage, output);
    return;
  }
  printHuman(formatFlatText(value), output);
}

export function withOutputFlags<T extends Command>(command: T): T {
  command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false);
  return command;
}
