/**
 * Scoped use of a reporter: the connection is closed exactly once however
 * the callback ends.
 */

import { redshiftConnectionFactory, type ConnectionFactory } from './connection.js';
import { QueryContextReporter, unwrapOutcome, type ReporterOptions } from './reporter.js';
import type { Row, TabularFrame } from './types.js';
import { loadRedshiftConfig, type RedshiftConfig } from '../config.js';

export type OutputShape = 'rows' | 'frame';

export async function withReporter<T>(
  connect: ConnectionFactory,
  fn: (reporter: QueryContextReporter) => Promise<T>,
  options: ReporterOptions = {},
): Promise<T> {
  const reporter = await QueryContextReporter.open(connect, options);
  try {
    return await fn(reporter);
  } finally {
    await reporter.close();
  }
}

export interface RunQueryOptions extends ReporterOptions {
  connect?: ConnectionFactory;
  /** Used when `connect` is absent; defaults to the REDSHIFT_* variables */
  config?: RedshiftConfig;
}

/**
 * Open a reporter, run one query, close. Throws QueryExecutionError on
 * failure.
 */
export function runQuery(sql: string, params: unknown[], shape: 'frame', options?: RunQueryOptions): Promise<TabularFrame>;
export function runQuery(sql: string, params?: unknown[], shape?: 'rows', options?: RunQueryOptions): Promise<Row[]>;
export async function runQuery(
  sql: string,
  params: unknown[] = [],
  shape: OutputShape = 'rows',
  options: RunQueryOptions = {},
): Promise<Row[] | TabularFrame> {
  const connect = options.connect ?? redshiftConnectionFactory(options.config ?? loadRedshiftConfig());
  return withReporter(
    connect,
    async (reporter) => {
      if (shape === 'frame') {
        return unwrapOutcome(await reporter.asFrame(sql, params));
      }
      return unwrapOutcome(await reporter.execute(sql, params));
    },
    { schema: options.schema, onDiagnostic: options.onDiagnostic },
  );
}
