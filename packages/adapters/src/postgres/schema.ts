import { getPool, quoteTableName, withTransaction, type DbConnector } from './pool.js';

const LOG_DDL = [
  `CREATE SCHEMA IF NOT EXISTS pipeline`,
  `CREATE TABLE IF NOT EXISTS pipeline.trip_log (
     seq           BIGSERIAL PRIMARY KEY,
     stream_name   TEXT        NOT NULL,
     partition_key TEXT        NOT NULL,
     payload       BYTEA       NOT NULL,
     created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
   )`,
  `CREATE INDEX IF NOT EXISTS trip_log_stream_seq_idx ON pipeline.trip_log (stream_name, seq)`,
  `CREATE TABLE IF NOT EXISTS pipeline.trip_log_offsets (
     stream_name TEXT        NOT NULL,
     consumer    TEXT        NOT NULL,
     seq         BIGINT      NOT NULL,
     updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     PRIMARY KEY (stream_name, consumer)
   )`,
];

export function tripTableDdl(tableName: string): string[] {
  const table = quoteTableName(tableName);
  const schema = tableName.includes('.') ? tableName.split('.')[0] : undefined;
  return [
    ...(schema ? [`CREATE SCHEMA IF NOT EXISTS "${schema}"`] : []),
    `CREATE TABLE IF NOT EXISTS ${table} (
       id         TEXT        PRIMARY KEY,
       data       JSONB       NOT NULL,
       updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  ];
}

/** Creates the log tables and any given trip tables. Idempotent. */
export async function applySchema(
  tripTables: string[] = [],
  db: DbConnector = getPool(),
): Promise<void> {
  const statements = [...LOG_DDL, ...tripTables.flatMap(tripTableDdl)];
  await withTransaction(async (client) => {
    for (const sql of statements) {
      await client.query(sql);
    }
  }, db);
}
