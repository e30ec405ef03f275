import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createServer, type Server, type Socket } from 'node:net';
import type { RedshiftConfig } from '../../config.js';
import { connectRedshift } from '../connection.js';
import { WarehouseConnectionError } from '../errors.js';

// AuthenticationOk followed by ReadyForQuery (idle)
const HANDSHAKE = Buffer.from([0x52, 0, 0, 0, 8, 0, 0, 0, 0, 0x5a, 0, 0, 0, 5, 0x49]);

function config(port: number): RedshiftConfig {
  return { host: '127.0.0.1', port, database: 'dev', user: 'test-user', password: 'test-password' };
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') resolve(address.port);
      else reject(new Error('server has no TCP address'));
    });
  });
}

function shutdown(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('connectRedshift', () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => (server.listening ? shutdown(server) : undefined)));
  });

  it('raises WarehouseConnectionError when nothing listens on the port', async () => {
    const server = createServer();
    const port = await listen(server);
    await shutdown(server);

    await assert.rejects(connectRedshift(config(port)), (err: unknown) => {
      assert.ok(err instanceof WarehouseConnectionError);
      assert.equal(err.code, 'CONNECTION_FAILED');
      assert.equal(err.driverMessage, `connect ECONNREFUSED 127.0.0.1:${port}`);
      assert.equal(err.message, `Failed to connect to Redshift: connect ECONNREFUSED 127.0.0.1:${port}`);
      return true;
    });
  });

  it('survives the server dropping an idle connection and fails the next query', async () => {
    const sockets: Socket[] = [];
    const server = createServer((socket) => {
      sockets.push(socket);
      socket.once('data', () => socket.write(HANDSHAKE));
    });
    servers.push(server);
    const port = await listen(server);

    const conn = await connectRedshift(config(port));
    sockets[0].destroy();
    await new Promise((resolve) => setTimeout(resolve, 50));

    await assert.rejects(conn.query('SELECT 1'), (err: unknown) => {
      assert.ok(err instanceof WarehouseConnectionError);
      assert.equal(err.code, 'CONNECTION_FAILED');
      assert.match(err.message, /^Redshift connection lost: /);
      return true;
    });
    await conn.close();
  });
});
