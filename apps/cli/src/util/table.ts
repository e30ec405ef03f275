/**
 * ASCII table for frames and column listings.
 */

import { formatScalar } from './text.js';

const MAX_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => col.length);
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatCell(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    const line = columns
      .map((col, i) => {
        const val = formatCell(row[col]);
        return val.length > widths[i] ? val.slice(0, widths[i] - 1) + '…' : val.padEnd(widths[i]);
      })
      .join(' | ');
    lines.push(line);
  }

  return lines.join('\n');
}

function formatCell(val: unknown): string {
  return val === null || val === undefined ? 'NULL' : formatScalar(val);
}
