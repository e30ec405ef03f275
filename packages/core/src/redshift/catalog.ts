/**
 * information_schema lookups with a per-connection memo.
 *
 * Staleness contract: table and column lists are read once per connection
 * and never refreshed on their own. A schema change made during the
 * session is not seen until `invalidate()` is called.
 */

import { CatalogLookupError } from './errors.js';
import { DEFAULT_SCHEMA } from './defaults.js';
import type { ColumnInfo, WarehouseConnection } from './types.js';

export const LIST_TABLES_SQL = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1
    AND table_type = 'BASE TABLE'
  ORDER BY table_name
`;

export const LIST_COLUMNS_SQL = `
  SELECT column_name, data_type, is_nullable
  FROM information_schema.columns
  WHERE table_schema = $1
    AND table_name = $2
  ORDER BY ordinal_position
`;

function copyColumns(columns: ColumnInfo[]): ColumnInfo[] {
  return columns.map((c) => ({ ...c }));
}

/** Lookups hand out copies; the memo itself is never exposed. */
export class CatalogCache {
  private readonly tables = new Map<string, string[]>();
  private readonly columns = new Map<string, ColumnInfo[]>();

  constructor(private readonly conn: WarehouseConnection) {}

  async listTables(schema: string = DEFAULT_SCHEMA): Promise<string[]> {
    const cached = this.tables.get(schema);
    if (cached) return [...cached];

    let names: string[];
    try {
      const result = await this.conn.query(LIST_TABLES_SQL, [schema]);
      names = result.rows.map((row) => String(row.table_name));
    } catch (err: unknown) {
      throw new CatalogLookupError(`schema "${schema}"`, err);
    }
    this.tables.set(schema, names);
    return [...names];
  }

  /**
   * Columns in physical order. A table that does not exist yields an
   * empty list, which is cached like any other answer.
   */
  async getColumns(table: string, schema: string = DEFAULT_SCHEMA): Promise<ColumnInfo[]> {
    const key = `${schema}.${table}`;
    const cached = this.columns.get(key);
    if (cached) return copyColumns(cached);

    let columns: ColumnInfo[];
    try {
      const result = await this.conn.query(LIST_COLUMNS_SQL, [schema, table]);
      columns = result.rows.map((row) => ({
        name: String(row.column_name),
        dataType: String(row.data_type),
        nullable: row.is_nullable === 'YES',
      }));
    } catch (err: unknown) {
      throw new CatalogLookupError(`table "${key}"`, err);
    }
    this.columns.set(key, columns);
    return copyColumns(columns);
  }

  invalidate(): void {
    this.tables.clear();
    this.columns.clear();
  }
}
