import type { Command } from 'commander';
import {
  DEFAULT_SCHEMA,
  frameToRecords,
  runQuery,
  textDiagnosticSink,
  withReporter,
  type OutputShape,
} from '@opsbridge/core';
import { printCommandSuccess, printDiagnostic, printHuman, printHumanTable, printResult, withOutputFlags } from '../output.js';
import { parseChoice, runCommand, withExamples, type CliServices } from '../command.js';

const OUTPUT_SHAPES: readonly OutputShape[] = ['rows', 'frame'];

interface QueryOptions {
  sql: string;
  param?: string[];
  format: string;
  schema: string;
}

export function registerRedshiftCommands(program: Command, services: CliServices): void {
  const redshift = program.command('redshift').description('Redshift queries with schema context');

  withExamples(
    withOutputFlags(
      redshift
        .command('tables')
        .description('List base tables in a schema')
        .option('--schema <schema>', 'Schema name', DEFAULT_SCHEMA)
        .action(async function (this: Command, opts: { schema: string }) {
          await runCommand(this, async (output) => {
            const tables = await withReporter(services.redshift(), (reporter) =>
              reporter.listAvailableTables(opts.schema),
            );
            if (output.json) {
              printCommandSuccess(tables, output);
              return;
            }
            printHuman(tables.length > 0 ? tables.join('\n') : `No tables in schema ${opts.schema}.`, output);
          });
        }),
    ),
    ['opsbridge redshift tables', 'opsbridge redshift tables --schema public --json'],
  );

  withExamples(
    withOutputFlags(
      redshift
        .command('columns <table>')
        .description('Show the columns of a table')
        .option('--schema <schema>', 'Schema name', DEFAULT_SCHEMA)
        .action(async function (this: Command, table: string, opts: { schema: string }) {
          await runCommand(this, async (output) => {
            const columns = await withReporter(services.redshift(), (reporter) =>
              reporter.getColumnInfo(table, opts.schema),
            );
            if (output.json) {
              printCommandSuccess(columns, output);
              return;
            }
            if (columns.length === 0) {
              printHuman(`Table ${opts.schema}.${table}: no columns found`, output);
              return;
            }
            printHumanTable(
              ['name', 'type', 'nullable'],
              columns.map((c) => ({ name: c.name, type: c.dataType, nullable: c.nullable ? 'YES' : 'NO' })),
              output,
            );
          });
        }),
    ),
    ['opsbridge redshift columns orders'],
  );

  withExamples(
    withOutputFlags(
      redshift
        .command('query')
        .description('Report schema context, then run a parameterized query')
        .requiredOption('--sql <sql>', 'SQL text; use $1, $2, ... for parameters')
        .option('--param <value...>', 'Parameter values in order')
        .option('--format <format>', 'Result shape: rows or frame', 'rows')
        .option('--schema <schema>', 'Schema used for context reporting', DEFAULT_SCHEMA)
        .action(async function (this: Command, opts: QueryOptions) {
          await runCommand(this, async (output) => {
            const format = parseChoice(opts.format, OUTPUT_SHAPES, '--format');
            const options = {
              connect: services.redshift(),
              schema: opts.schema,
              onDiagnostic: textDiagnosticSink((text) => printDiagnostic(text, output)),
            };
            const params = opts.param ?? [];

            if (format === 'frame') {
              const frame = await runQuery(opts.sql, params, 'frame', options);
              if (output.json) {
                printCommandSuccess(frame, output);
                return;
              }
              printHumanTable(frame.columns, frameToRecords(frame), output);
              return;
            }

            printResult(await runQuery(opts.sql, params, 'rows', options), output, '(0 rows)');
          });
        }),
    ),
    [
      'opsbridge redshift query --sql "SELECT * FROM cc.orders LIMIT 10" --format frame',
      'opsbridge redshift query --sql "SELECT * FROM cc.orders WHERE id = $1" --param 42 --json',
    ],
  );
}
