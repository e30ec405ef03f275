import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import {
  ConfigError,
  LIST_COLUMNS_SQL,
  LIST_TABLES_SQL,
  type WarehouseConnection,
  type WarehouseQueryResult,
} from '@opsbridge/core';
import { createProgram } from '../program.js';
import type { CliServices } from '../command.js';

const EMPTY: WarehouseQueryResult = { columns: [], rows: [] };

class StubWarehouse implements WarehouseConnection {
  readonly statements: string[] = [];
  closeCount = 0;

  async query(sql: string): Promise<WarehouseQueryResult> {
    this.statements.push(sql);
    if (sql === 'BEGIN' || sql === 'COMMIT' || sql === 'ROLLBACK') return EMPTY;
    if (sql === LIST_TABLES_SQL) {
      return { columns: ['table_name'], rows: [{ table_name: 'orders' }] };
    }
    if (sql === LIST_COLUMNS_SQL) {
      return {
        columns: ['column_name', 'data_type', 'is_nullable'],
        rows: [
          { column_name: 'id', data_type: 'integer', is_nullable: 'NO' },
          { column_name: 'total', data_type: 'numeric', is_nullable: 'YES' },
        ],
      };
    }
    if (sql === 'SELECT id, total FROM cc.orders') {
      return { columns: ['id', 'total'], rows: [{ id: 1, total: '9.50' }] };
    }
    throw new Error('relation "cc.nope" does not exist');
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }
}

function stubServices(conn: WarehouseConnection): CliServices {
  return {
    jira: () => {
      throw new ConfigError('Jira is not configured. Missing environment variables: JIRA_URL', ['JIRA_URL']);
    },
    confluence: () => {
      throw new ConfigError('Confluence is not configured. Missing environment variables: CONFLUENCE_URL', [
        'CONFLUENCE_URL',
      ]);
    },
    redshift: () => async () => conn,
  };
}

async function run(conn: StubWarehouse, args: string[]) {
  const log = mock.method(console, 'log', () => {});
  const error = mock.method(console, 'error', () => {});
  await createProgram(stubServices(conn)).parseAsync(['node', 'opsbridge', ...args]);
  return {
    stdout: log.mock.calls.map((call) => call.arguments[0]),
    stderr: error.mock.calls.map((call) => call.arguments[0]),
  };
}

afterEach(() => {
  mock.restoreAll();
  process.exitCode = undefined;
});

describe('redshift commands', () => {
  it('lists tables and closes the connection', async () => {
    const conn = new StubWarehouse();
    const { stdout } = await run(conn, ['redshift', 'tables']);
    assert.deepEqual(stdout, ['orders']);
    assert.equal(conn.closeCount, 1);
  });

  it('prints a frame as a table with diagnostics on stderr', async () => {
    const conn = new StubWarehouse();
    const { stdout, stderr } = await run(conn, [
      'redshift',
      'query',
      '--sql',
      'SELECT id, total FROM cc.orders',
      '--format',
      'frame',
    ]);
    assert.deepEqual(stdout, ['id | total\n---+------\n1  | 9.50 ']);
    assert.deepEqual(stderr, [
      'Available tables in schema cc:\n  - orders',
      'Columns in cc.orders:\n  - id (integer)\n  - total (numeric, nullable)',
      'Executing query (0 parameters)',
    ]);
  });

  it('prints rows as JSON and stays silent on stderr when quiet', async () => {
    const conn = new StubWarehouse();
    const { stdout, stderr } = await run(conn, [
      'redshift',
      'query',
      '--sql',
      'SELECT id, total FROM cc.orders',
      '--json',
      '--quiet',
    ]);
    assert.deepEqual(stdout, [JSON.stringify({ ok: true, data: [{ id: 1, total: '9.50' }] }, null, 2)]);
    assert.deepEqual(stderr, []);
  });

  it('reports a failed query with exit code 2', async () => {
    const conn = new StubWarehouse();
    const { stdout } = await run(conn, ['redshift', 'query', '--sql', 'SELECT * FROM cc.nope', '--json', '--quiet']);
    assert.deepEqual(stdout, [
      JSON.stringify(
        { ok: false, code: 'DB_QUERY_FAILED', message: 'Query execution failed: relation "cc.nope" does not exist' },
        null,
        2,
      ),
    ]);
    assert.equal(process.exitCode, 2);
    assert.equal(conn.closeCount, 1);
  });
});

describe('argument and configuration errors', () => {
  it('rejects an unknown sort field with exit code 1', async () => {
    const { stderr } = await run(new StubWarehouse(), ['jira', 'get-my-issues', '--sort', 'priority']);
    assert.deepEqual(stderr, ['Error: Invalid --sort "priority". Expected one of: created, updated.']);
    assert.equal(process.exitCode, 1);
  });

  it('exits with 3 when the service is not configured', async () => {
    const { stderr } = await run(new StubWarehouse(), ['jira', 'get-overdue']);
    assert.deepEqual(stderr, ['Error: Jira is not configured. Missing environment variables: JIRA_URL']);
    assert.equal(process.exitCode, 3);
  });

  it('rejects a non-numeric limit before contacting Confluence', async () => {
    const { stderr } = await run(new StubWarehouse(), ['confluence', 'search', '--query', 'type = page', '--limit', 'ten']);
    assert.deepEqual(stderr, ['Error: Invalid --limit "ten". Expected a positive integer.']);
    assert.equal(process.exitCode, 1);
  });
});
