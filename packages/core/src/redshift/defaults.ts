/**
 * Fixed values existing callers depend on.
 */

/** Schema searched when none is given */
export const DEFAULT_SCHEMA = 'cc';

/** Redshift listens on 5439, not the Postgres 5432 */
export const DEFAULT_REDSHIFT_PORT = 5439;
