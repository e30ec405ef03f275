/**
 * Best-effort scan for the tables a query reads from.
 *
 * This is an identifier scanner, not a SQL parser. It picks the word after
 * every FROM or JOIN keyword (case-insensitive), skipping an optional
 * `<schema>.` prefix. Known misses and false hits:
 *
 * - a different schema prefix (`FROM public.orders`) yields the schema name
 * - quoted identifiers (`FROM "Orders"`) are not matched
 * - `EXTRACT(YEAR FROM created_at)` yields `created_at`
 * - CTE names are reported as tables; tables inside subqueries are found
 *   only when they follow FROM/JOIN directly
 */

import { DEFAULT_SCHEMA } from './defaults.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function extractReferencedTables(sql: string, schema: string = DEFAULT_SCHEMA): Set<string> {
  const pattern = new RegExp(`\\b(?:FROM|JOIN)\\s+(?:${escapeRegExp(schema)}\\.)?(\\w+)`, 'gi');
  const tables = new Set<string>();
  for (const match of sql.matchAll(pattern)) {
    tables.add(match[1]);
  }
  return tables;
}
