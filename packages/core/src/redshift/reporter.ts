/**
 * Query context reporter.
 *
 * Before running a query it reports which tables the schema holds and the
 * columns of every table the query appears to read, then runs the query
 * and hands back plain row objects. Reports go to a caller-supplied sink
 * as structured events; the default sink drops them.
 */

import { CatalogCache } from './catalog.js';
import { DEFAULT_SCHEMA } from './defaults.js';
import { CatalogLookupError, QueryExecutionError } from './errors.js';
import { toFrame } from './frame.js';
import { extractReferencedTables } from './table-refs.js';
import type { ConnectionFactory } from './connection.js';
import type {
  ColumnInfo,
  DiagnosticSink,
  QueryOutcome,
  Row,
  TabularFrame,
  WarehouseConnection,
  WarehouseQueryResult,
} from './types.js';

export interface ReporterOptions {
  /** Schema used for table listing and reference extraction */
  schema?: string;
  onDiagnostic?: DiagnosticSink;
}

const discard: DiagnosticSink = () => {};

export class QueryContextReporter {
  readonly schema: string;
  private readonly catalog: CatalogCache;
  private readonly onDiagnostic: DiagnosticSink;
  private closed = false;

  constructor(
    private readonly conn: WarehouseConnection,
    options: ReporterOptions = {},
  ) {
    this.schema = options.schema ?? DEFAULT_SCHEMA;
    this.catalog = new CatalogCache(conn);
    this.onDiagnostic = options.onDiagnostic ?? discard;
  }

  /**
   * Open a connection through `connect` and wrap it. Connection failures
   * propagate unchanged.
   */
  static async open(connect: ConnectionFactory, options: ReporterOptions = {}): Promise<QueryContextReporter> {
    const conn = await connect();
    return new QueryContextReporter(conn, options);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Base tables in `schema`, read once per connection. */
  listAvailableTables(schema: string = DEFAULT_SCHEMA): Promise<string[]> {
    return this.catalog.listTables(schema);
  }

  /** Columns of `schema.table`, read once per connection. Unknown tables give []. */
  getColumnInfo(table: string, schema: string = DEFAULT_SCHEMA): Promise<ColumnInfo[]> {
    return this.catalog.getColumns(table, schema);
  }

  /** Forget every cached table and column list. */
  invalidate(): void {
    this.catalog.invalidate();
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryOutcome<Row[]>> {
    const outcome = await this.run(sql, params);
    if (!outcome.ok) return outcome;
    return { ok: true, value: outcome.value.rows };
  }

  /** Like `execute`, with columns in the order the result set gives them. */
  async asFrame(sql: string, params: unknown[] = []): Promise<QueryOutcome<TabularFrame>> {
    const outcome = await this.run(sql, params);
    if (!outcome.ok) return outcome;
    return { ok: true, value: toFrame(outcome.value.rows, outcome.value.columns) };
  }

  /** Release the connection. Only the first call reaches the driver. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.conn.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Reporter is closed');
    }
  }

  private async run(sql: string, params: unknown[]): Promise<QueryOutcome<WarehouseQueryResult>> {
    this.assertOpen();
    await this.reportContext(sql);

    this.onDiagnostic({ type: 'execution-start', sql, paramCount: params.length });
    try {
      await this.conn.query('BEGIN');
      const result = await this.conn.query(sql, params);
      await this.conn.query('COMMIT');
      return { ok: true, value: { columns: [...result.columns], rows: result.rows.map((row) => ({ ...row })) } };
    } catch (err: unknown) {
      await this.rollback();
      return { ok: false, error: new QueryExecutionError(err) };
    }
  }

  private async rollback(): Promise<void> {
    try {
      await this.conn.query('ROLLBACK');
    } catch {
      // the query error is reported instead
    }
  }

  /**
   * Catalog failures here are reported and swallowed so the query still
   * runs and its own outcome reaches the caller.
   */
  private async reportContext(sql: string): Promise<void> {
    try {
      const tables = await this.catalog.listTables(this.schema);
      this.onDiagnostic({ type: 'tables', schema: this.schema, tables });
    } catch (err: unknown) {
      if (!(err instanceof CatalogLookupError)) throw err;
      this.onDiagnostic({ type: 'diagnostics-failed', stage: 'tables', schema: this.schema, error: err });
    }

    for (const table of extractReferencedTables(sql, this.schema)) {
      try {
        const columns = await this.catalog.getColumns(table, this.schema);
        this.onDiagnostic({ type: 'columns', schema: this.schema, table, columns });
      } catch (err: unknown) {
        if (!(err instanceof CatalogLookupError)) throw err;
        this.onDiagnostic({
          type: 'diagnostics-failed',
          stage: 'columns',
          schema: this.schema,
          table,
          error: err,
        });
      }
    }
  }
}

/**
 * Turn a failed outcome into a thrown QueryExecutionError.
 */
export function unwrapOutcome<T>(outcome: QueryOutcome<T>): T {
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}
