import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createDbClient } from '../../src/store/driver.js';
import { toPgParams } from '../../src/store/postgres.js';

describe('createDbClient', () => {
  it('creates a SQLite client when no dbUrl is provided', async () => {
    const client = await createDbClient({ dbUrl: undefined, dbPath: ':memory:' });
    assert.equal(client.dialect, 'sqlite');
    await client.exec('CREATE TABLE test (id INTEGER PRIMARY KEY, val TEXT)');
    await client.run('INSERT INTO test (val) VALUES (?)', ['hello']);
    const row = await client.get<{ val: string }>('SELECT val FROM test WHERE id = 1');
    assert.equal(row?.val, 'hello');
    await client.close();
  });

  it('commits a successful transaction and returns its result', async () => {
    const client = await createDbClient({ dbUrl: undefined, dbPath: ':memory:' });
    await client.exec('CREATE TABLE nums (n INTEGER)');
    const result = await client.transaction(async () => {
      await client.run('INSERT INTO nums (n) VALUES (?)', [1]);
      await client.run('INSERT INTO nums (n) VALUES (?)', [2]);
      return 'done';
    });
    assert.equal(result, 'done');
    const rows = await client.all<{ n: number }>('SELECT n FROM nums ORDER BY n');
    assert.deepEqual(rows.map(r => r.n), [1, 2]);
    await client.close();
  });

  it('rolls back a failed transaction', async () => {
    const client = await createDbClient({ dbUrl: undefined, dbPath: ':memory:' });
    await client.exec('CREATE TABLE nums (n INTEGER)');
    await assert.rejects(client.transaction(async () => {
      await client.run('INSERT INTO nums (n) VALUES (?)', [1]);
      throw new Error('boom');
    }), /boom/);
    const rows = await client.all<{ n: number }>('SELECT n FROM nums');
    assert.equal(rows.length, 0);
    await client.close();
  });
});

describe('toPgParams', () => {
  it('numbers placeholders in order', () => {
    assert.equal(toPgParams('SELECT * FROM t WHERE a = ? AND b = ?'), 'SELECT * FROM t WHERE a = $1 AND b = $2');
  });
});
