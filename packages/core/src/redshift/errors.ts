/**
 * Warehouse failures. Every error keeps the driver's message text and the
 * original error as `cause`.
 */

export type WarehouseErrorCode = 'CONNECTION_FAILED' | 'QUERY_FAILED' | 'CATALOG_LOOKUP_FAILED';

export function driverMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class WarehouseError extends Error {
  readonly code: WarehouseErrorCode;
  readonly driverMessage: string;

  constructor(code: WarehouseErrorCode, prefix: string, cause: unknown) {
    const detail = driverMessage(cause);
    super(`${prefix}: ${detail}`, { cause });
    this.name = 'WarehouseError';
    this.code = code;
    this.driverMessage = detail;
  }
}

/** The connection could not be established, or was lost. Not retried. */
export class WarehouseConnectionError extends WarehouseError {
  constructor(cause: unknown, prefix = 'Failed to connect to Redshift') {
    super('CONNECTION_FAILED', prefix, cause);
    this.name = 'WarehouseConnectionError';
  }
}

/** The warehouse rejected a query. The transaction has been rolled back. */
export class QueryExecutionError extends WarehouseError {
  constructor(cause: unknown) {
    super('QUERY_FAILED', 'Query execution failed', cause);
    this.name = 'QueryExecutionError';
  }
}

/** A lookup against information_schema failed. */
export class CatalogLookupError extends WarehouseError {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super('CATALOG_LOOKUP_FAILED', `Catalog lookup failed for ${target}`, cause);
    this.name = 'CatalogLookupError';
    this.target = target;
  }
}
