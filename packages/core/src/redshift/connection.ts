/**
 * Redshift connection over the `pg` driver (Redshift speaks the Postgres
 * wire protocol). One client per connection, no pool.
 */

import pg from 'pg';
import type { Client as PgClient } from 'pg';
import type { RedshiftConfig } from '../config.js';
import { WarehouseConnectionError } from './errors.js';
import type { Row, WarehouseConnection, WarehouseQueryResult } from './types.js';

const { Client } = pg;

const CONNECTION_LOST = 'Redshift connection lost';

export type ConnectionFactory = () => Promise<WarehouseConnection>;

/**
 * The client is long-lived, so a server can drop it while idle. pg reports
 * that as an 'error' event; it is recorded here and raised by the next
 * `query()` instead of escaping as an uncaught exception.
 */
class PgWarehouseConnection implements WarehouseConnection {
  private lost: Error | undefined;

  constructor(private readonly client: PgClient) {
    client.on('error', (err) => {
      this.lost = err;
    });
  }

  async query(sql: string, params: unknown[] = []): Promise<WarehouseQueryResult> {
    if (this.lost) throw new WarehouseConnectionError(this.lost, CONNECTION_LOST);
    try {
      const result = await this.client.query<Row>(sql, params);
      return {
        columns: result.fields?.map((f) => f.name) ?? [],
        rows: result.rows ?? [],
      };
    } catch (err: unknown) {
      if (this.lost) throw new WarehouseConnectionError(this.lost, CONNECTION_LOST);
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

/**
 * Open a connection, or fail with WarehouseConnectionError.
 */
export async function connectRedshift(cfg: RedshiftConfig): Promise<WarehouseConnection> {
  const client = new Client({
    host: cfg.host,
    port: cfg.port,
    database: cfg.database,
    user: cfg.user,
    password: cfg.password,
  });
  const conn = new PgWarehouseConnection(client);

  try {
    await client.connect();
  } catch (err: unknown) {
    try {
      await client.end();
    } catch {
      // the connect failure is the error worth reporting
    }
    throw new WarehouseConnectionError(err);
  }
  return conn;
}

export function redshiftConnectionFactory(cfg: RedshiftConfig): ConnectionFactory {
  return () => connectRedshift(cfg);
}
