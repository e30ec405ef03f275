/**
 * Types shared by the Redshift query context reporter and its collaborators.
 */

import type { CatalogLookupError, QueryExecutionError } from './errors.js';

export type Row = Record<string, unknown>;

export interface WarehouseQueryResult {
  columns: string[];
  rows: Row[];
}

/**
 * An open warehouse session. The reporter owns it exclusively and issues
 * one statement at a time.
 */
export interface WarehouseConnection {
  query(sql: string, params?: unknown[]): Promise<WarehouseQueryResult>;
  close(): Promise<void>;
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
}

export interface TabularFrame {
  columns: string[];
  rows: unknown[][];
}

export type QueryOutcome<T> = { ok: true; value: T } | { ok: false; error: QueryExecutionError };

export type QueryDiagnostic =
  | { type: 'tables'; schema: string; tables: string[] }
  | { type: 'columns'; schema: string; table: string; columns: ColumnInfo[] }
  | { type: 'execution-start'; sql: string; paramCount: number }
  | {
      type: 'diagnostics-failed';
      stage: 'tables' | 'columns';
      schema: string;
      table?: string;
      error: CatalogLookupError;
    };

export type DiagnosticSink = (event: QueryDiagnostic) => void;
