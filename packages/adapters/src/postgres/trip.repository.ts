import type {
  TripRecord,
  TripScanFilter,
  TripScanPage,
  TripStorePort,
} from '@ride-pipeline/domain';
import { getPool, quoteTableName } from './pool.js';
import type { DbQueryable } from './pool.js';

const DEFAULT_PAGE_SIZE = 500;

type TripRow = {
  id: string;
  data: Record<string, unknown>;
};

/**
 * Keyed trip store on a `(id text primary key, data jsonb)` table.
 * Scans page by primary key; the last id of a full page is the continuation token.
 */
export class PgTripStore implements TripStorePort {
  private readonly table: string;

  constructor(
    tableName: string,
    private readonly db: DbQueryable = getPool(),
    private readonly pageSize: number = DEFAULT_PAGE_SIZE,
  ) {
    this.table = quoteTableName(tableName);
  }

  async getItem(id: string): Promise<TripRecord | null> {
    const { rows } = await this.db.query<TripRow>(
      `SELECT id, data FROM ${this.table} WHERE id = $1`,
      [id],
    );
    return rows[0] ? mapTripRow(rows[0]) : null;
  }

  async putItem(item: TripRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.table} (id, data, updated_at)
       VALUES ($1, $2::jsonb, NOW())
       ON CONFLICT (id) DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
      [item.id, JSON.stringify(item)],
    );
  }

  async scan(filter: TripScanFilter, startKey?: string): Promise<TripScanPage> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filter.requiredFields.length) {
      conditions.push(`data ?& $${idx++}::text[]`);
      params.push([...filter.requiredFields]);
    }
    if (startKey !== undefined) {
      conditions.push(`id > $${idx++}`);
      params.push(startKey);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.db.query<TripRow>(
      `SELECT id, data FROM ${this.table} ${where} ORDER BY id LIMIT $${idx++}`,
      [...params, this.pageSize],
    );

    const items = rows.map(mapTripRow);
    const last = rows[rows.length - 1];
    if (rows.length < this.pageSize || !last) return { items };
    return { items, lastEvaluatedKey: last.id };
  }
}

function mapTripRow(row: TripRow): TripRecord {
  return { ...row.data, id: row.id };
}
