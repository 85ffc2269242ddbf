import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

/** The slice of a pool or client the repositories need. */
export type DbQueryable = Pick<pg.Pool, 'query'>;

/** Anything that hands out clients for a transaction. */
export type DbConnector = Pick<pg.Pool, 'connect'>;

let sharedPool: pg.Pool | null = null;

/**
 * Process-wide pool shared by the trip store, the trip log and schema setup.
 * Connects through `DATABASE_URL`; `DATABASE_POOL_MAX` caps the client count.
 */
export function getPool(): pg.Pool {
  if (!sharedPool) {
    sharedPool = new Pool({
      connectionString: process.env['DATABASE_URL'],
      max: poolSize(process.env['DATABASE_POOL_MAX']),
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'ride-pipeline',
    });
    sharedPool.on('error', (err) => {
      console.error('[pg-pool] idle client error', err);
    });
  }
  return sharedPool;
}

/** Pool size from the environment; unset or non-positive values fall back to 10. */
export function poolSize(raw: string | undefined): number {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 10;
}

/** Ends the shared pool on shutdown; a later getPool() opens a fresh one. */
export async function closePool(): Promise<void> {
  if (!sharedPool) return;
  const pool = sharedPool;
  sharedPool = null;
  await pool.end();
}

/**
 * Runs `fn` on one client between BEGIN and COMMIT. A failure rolls back and
 * rethrows the original error, even when the rollback itself fails.
 */
export async function withTransaction<T>(
  fn: (client: DbClient) => Promise<T>,
  db: DbConnector = getPool(),
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      console.error('[pg-pool] rollback failed', rollbackErr);
    });
    throw err;
  } finally {
    client.release();
  }
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Quotes a `table` or `schema.table` name for interpolation into SQL.
 * Table names come from configuration, so anything but plain identifiers is refused.
 */
export function quoteTableName(name: string): string {
  const parts = name.split('.');
  if (parts.length > 2 || !parts.every((p) => IDENTIFIER.test(p))) {
    throw new Error(`Invalid table name: ${name}`);
  }
  return parts.map((p) => `"${p}"`).join('.');
}
