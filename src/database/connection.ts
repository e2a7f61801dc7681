import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow, types } from 'pg';
import { config } from '../config';
import { logger } from '../utils/logger';

// DATE columns stay `YYYY-MM-DD` strings instead of local-midnight Date objects
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

/**
 * Anything SQL can be sent to: the pool itself or a client checked out for a transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionRunner {
  transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
}

const asQueryable = (target: Pool | PoolClient): Queryable => ({
  query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
    target.query<R>(text, params)
});

class DatabaseConnection implements Queryable, TransactionRunner {
  private pool: Pool | null = null;

  private poolConfig(): PoolConfig {
    return {
      host: config.database.host,
      port: config.database.port,
      database: config.database.name,
      user: config.database.user,
      password: config.database.password,
      ssl: config.database.ssl,
      max: config.database.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    };
  }

  /**
   * Initialize the connection pool and check that the server answers
   */
  public async connect(): Promise<void> {
    if (this.pool) {
      return;
    }

    this.pool = new Pool(this.poolConfig());
    this.pool.on('error', (err) => {
      logger.error('Unexpected error on idle client', { error: err.message });
    });

    try {
      await this.testConnection();
      logger.info('Database connection established successfully', {
        host: config.database.host,
        port: config.database.port,
        database: config.database.name,
      });
    } catch (error) {
      await this.disconnect();
      throw new Error(`Database connection failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.pool;
  }

  public async getClient(): Promise<PoolClient> {
    return this.requirePool().connect();
  }

  /**
   * Execute a query on a pooled client
   */
  public async query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>> {
    const pool = this.requirePool();
    const start = Date.now();
    try {
      const result = await pool.query<R>(text, params);
      logger.debug('Executed query', {
        query: text,
        duration: `${Date.now() - start}ms`,
        rows: result.rowCount,
      });
      return result;
    } catch (error) {
      logger.error('Query execution failed', {
        query: text,
        duration: `${Date.now() - start}ms`,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  /**
   * Run the callback inside BEGIN/COMMIT on one client, rolling back if it throws
   */
  public async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.getClient();

    try {
      await client.query('BEGIN');
      const result = await callback(asQueryable(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.debug('Transaction rolled back', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      client.release();
    }
  }

  public async testConnection(): Promise<void> {
    await this.requirePool().query('SELECT 1');
  }

  public async disconnect(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      logger.info('Database connection closed');
    }
  }

  public isConnected(): boolean {
    return this.pool !== null;
  }
}

export const database = new DatabaseConnection();

export type { DatabaseConnection, PoolClient };
