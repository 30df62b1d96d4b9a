import type { Pool, PoolClient, QueryResult } from 'pg';
import type { DbClient } from './driver.js';

export class PgClient implements DbClient {
  readonly dialect = 'postgres' as const;
  private pool: Pool;
  private txClient: PoolClient | null = null;

  private constructor(pool: Pool) {
    this.pool = pool;
  }

  static async connect(connectionString: string): Promise<PgClient> {
    const pg = await import('pg');
    const pool = new pg.default.Pool({ connectionString });
    // Fail fast when the server is unreachable
    const client = await pool.connect();
    client.release();
    return new PgClient(pool);
  }

  private query(sql: string, params?: unknown[]): Promise<QueryResult> {
    return this.txClient ? this.txClient.query(sql, params) : this.pool.query(sql, params);
  }

  async run(sql: string, params: unknown[] = []): Promise<void> {
    await this.query(toPgParams(sql), params);
  }

  async get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const result = await this.query(toPgParams(sql), params);
    return result.rows[0] as T | undefined;
  }

  async all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.query(toPgParams(sql), params);
    return result.rows as T[];
  }

  async exec(sql: string): Promise<void> {
    await this.query(sql);
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    this.txClient = client;
    try {
      await client.query('BEGIN');
      const result = await fn();
      await client.query('COMMIT');
      return result;
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      this.txClient = null;
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/** SQLite-style `?` placeholders to PostgreSQL `$1, $2, …`. */
export function toPgParams(sql: string): string {
  let idx = 0;
  return sql.replace(/\?/g, () => `$${++idx}`);
}
