import pg from 'pg';

const { Pool } = pg;

let pool: pg.Pool | null = null;

export interface DatabaseConfig {
  connectionString?: string;
}

export interface SqlResult<T> {
  rows: T[];
  rowCount: number | null;
}

/**
 * The slice of a pg pool the stores depend on.
 * `transaction` runs `work` on one connection between BEGIN and COMMIT,
 * rolling back when it throws.
 */
export interface SqlExecutor {
  query<T extends pg.QueryResultRow>(sql: string, params?: unknown[]): Promise<SqlResult<T>>;
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}

/**
 * Get or create the database connection pool
 * Connection pooling is reused across requests
 */
export function getPool(config?: DatabaseConfig): pg.Pool {
  if (!pool) {
    pool = new Pool(config || {
      connectionString: process.env.DATABASE_URL,
    });

    pool.on('error', (err) => {
      console.error('[DB] Unexpected database pool error:', err);
    });
  }

  return pool;
}

/**
 * Close the database connection pool
 * Call this when shutting down the application
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

function clientExecutor(client: pg.PoolClient): SqlExecutor {
  const executor: SqlExecutor = {
    async query<T extends pg.QueryResultRow>(sql: string, params?: unknown[]) {
      const result = await client.query<T>(sql, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    // Already inside a transaction; nested work joins it
    transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      return work(executor);
    },
  };
  return executor;
}

export function createPoolExecutor(poolInstance: pg.Pool): SqlExecutor {
  return {
    async query<T extends pg.QueryResultRow>(sql: string, params?: unknown[]) {
      const result = await poolInstance.query<T>(sql, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },

    async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      const client = await poolInstance.connect();
      try {
        await client.query('BEGIN');
        const result = await work(clientExecutor(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    },
  };
}

function hasPgCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function isUniqueViolation(error: unknown): boolean {
  return hasPgCode(error, '23505');
}

export function isForeignKeyViolation(error: unknown): boolean {
  return hasPgCode(error, '23503');
}
