import { Pool } from 'pg';
import { DatabaseConfig } from './env';
import { logger } from '../utils/logger';
import { classifyDatabaseError, ConnectivityError, toError } from '../utils/errors';

export type Row = Record<string, unknown>;

export interface QueryResultLike {
  rows: Row[];
  rowCount: number | null;
}

export interface LedgerClient {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  release(err?: Error | boolean): void;
}

/** The slice of `pg.Pool` the ledger relies on. */
export interface LedgerPool {
  connect(): Promise<LedgerClient>;
  end(): Promise<void>;
}

/** Anything that can run one parameterised statement. */
export interface Queryable {
  query(operation: string, text: string, params?: unknown[]): Promise<QueryResultLike>;
}

/** A Queryable that can also run several statements as one unit. */
export interface TransactionalQueryable extends Queryable {
  transaction<T>(operation: string, work: (tx: Queryable) => Promise<T>): Promise<T>;
}

const SLOW_QUERY_MS = 1000;

export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    min: config.minConnections,
    max: config.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.timeoutMs,
    statement_timeout: config.timeoutMs,
    query_timeout: config.timeoutMs,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database pool error', { error: err.message });
  });

  return pool;
}

/**
 * Lends one pooled connection per operation. The connection goes back to the
 * pool on every exit path; a connection that failed at the transport level is
 * destroyed instead of being reused.
 */
export class ConnectionManager implements TransactionalQueryable {
  constructor(private readonly pool: LedgerPool) {}

  async withConnection<T>(operation: string, work: (client: LedgerClient) => Promise<T>): Promise<T> {
    let client: LedgerClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw classifyDatabaseError(operation, error);
    }

    let failure: Error | undefined;
    try {
      return await work(client);
    } catch (error) {
      failure = classifyDatabaseError(operation, error);
      throw failure;
    } finally {
      client.release(failure instanceof ConnectivityError ? failure : undefined);
    }
  }

  async query(operation: string, text: string, params?: unknown[]): Promise<QueryResultLike> {
    return this.withConnection(operation, async (client) => {
      const start = Date.now();
      const result = await client.query(text, params);
      const duration = Date.now() - start;

      if (duration > SLOW_QUERY_MS) {
        logger.warn('Slow query detected', { operation, text: text.substring(0, 100), duration, rows: result.rowCount });
      }

      return result;
    });
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on a single connection. Any failure rolls
   * the whole unit back before the error is rethrown.
   */
  async transaction<T>(operation: string, work: (tx: Queryable) => Promise<T>): Promise<T> {
    return this.withConnection(operation, async (client) => {
      const tx: Queryable = {
        query: async (step, text, params) => {
          try {
            return await client.query(text, params);
          } catch (error) {
            throw classifyDatabaseError(step, error);
          }
        },
      };

      await client.query('BEGIN');
      try {
        const result = await work(tx);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.warn('Rollback failed', { operation, error: toError(rollbackError).message });
        }
        throw error;
      }
    });
  }

  async checkHealth(): Promise<{ status: string; error?: string }> {
    try {
      await this.query('health', 'SELECT 1');
      return { status: 'healthy' };
    } catch (error) {
      return { status: 'unhealthy', error: toError(error).message };
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
