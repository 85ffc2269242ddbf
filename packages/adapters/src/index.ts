// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction, quoteTableName, poolSize } from './postgres/pool.js';
export type { DbPool, DbClient, DbQueryable, DbConnector } from './postgres/pool.js';
export { applySchema, tripTableDdl } from './postgres/schema.js';
export { PgTripStore } from './postgres/trip.repository.js';
export { PgTripLog } from './postgres/trip-log.repository.js';

// ─── Filesystem Adapters ───────────────────────────────────────────────────────
export { FsObjectStore, ObjectNotFoundError } from './filesystem/fs-object-store.js';
