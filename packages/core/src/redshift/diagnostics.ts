/**
 * Text rendering for reporter diagnostics.
 */

import type { ColumnInfo, DiagnosticSink, QueryDiagnostic } from './types.js';

function formatColumn(col: ColumnInfo): string {
  return `  - ${col.name} (${col.dataType}${col.nullable ? ', nullable' : ''})`;
}

export function formatDiagnostic(event: QueryDiagnostic): string {
  switch (event.type) {
    case 'tables':
      return [`Available tables in schema ${event.schema}:`, ...event.tables.map((t) => `  - ${t}`)].join('\n');
    case 'columns':
      if (event.columns.length === 0) {
        return `Table ${event.schema}.${event.table}: no columns found`;
      }
      return [`Columns in ${event.schema}.${event.table}:`, ...event.columns.map(formatColumn)].join('\n');
    case 'execution-start':
      return `Executing query (${event.paramCount} parameter${event.paramCount === 1 ? '' : 's'})`;
    case 'diagnostics-failed':
      return `Could not load ${event.stage} for ${event.table ? `${event.schema}.${event.table}` : event.schema}: ${event.error.driverMessage}`;
  }
}

/** Sink that writes each rendered diagnostic through `write`. */
export function textDiagnosticSink(write: (text: string) => void): DiagnosticSink {
  return (event) => write(formatDiagnostic(event));
}
