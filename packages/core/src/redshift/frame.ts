import type { Row, TabularFrame } from './types.js';

/**
 * Columns follow `fields`, the driver's result-set order, when given. Keys
 * a row carries beyond those are appended in first-seen order; a row
 * missing a column gets null there. Zero rows give zero columns.
 */
export function toFrame(rows: Row[], fields: string[] = []): TabularFrame {
  if (rows.length === 0) return { columns: [], rows: [] };

  const columns: string[] = [];
  const seen = new Set<string>();
  const add = (key: string) => {
    if (!seen.has(key)) {
      seen.add(key);
      columns.push(key);
    }
  };
  fields.forEach(add);
  for (const row of rows) {
    Object.keys(row).forEach(add);
  }

  return {
    columns,
    rows: rows.map((row) => columns.map((col) => (Object.hasOwn(row, col) ? row[col] : null))),
  };
}

export function frameToRecords(frame: TabularFrame): Row[] {
  return frame.rows.map((values) => Object.fromEntries(frame.columns.map((col, i) => [col, values[i]])));
}
