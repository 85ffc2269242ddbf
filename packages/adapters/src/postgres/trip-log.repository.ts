import type { AppendLogPort, AppendReceipt, LogBatchItem, LogReaderPort } from '@ride-pipeline/domain';
import { getPool } from './pool.js';
import type { DbQueryable } from './pool.js';

type LogRow = {
  seq: string;
  partition_key: string;
  payload: Buffer;
};

/**
 * Append-only trip log on `pipeline.trip_log`. Sequence numbers are the
 * bigserial `seq`, kept as strings; consumers track their position in
 * `pipeline.trip_log_offsets`.
 */
export class PgTripLog implements AppendLogPort, LogReaderPort {
  constructor(private readonly db: DbQueryable = getPool()) {}

  async append(streamName: string, payload: Buffer, partitionKey: string): Promise<AppendReceipt> {
    const { rows } = await this.db.query<{ seq: string }>(
      `INSERT INTO pipeline.trip_log (stream_name, partition_key, payload)
       VALUES ($1, $2, $3)
       RETURNING seq`,
      [streamName, partitionKey, payload],
    );
    const row = rows[0];
    if (!row) throw new Error(`Append to ${streamName} returned no sequence number`);
    return { sequenceNumber: String(row.seq) };
  }

  async readBatch(
    streamName: string,
    afterSequence: string | null,
    limit: number,
  ): Promise<LogBatchItem[]> {
    const { rows } = await this.db.query<LogRow>(
      `SELECT seq, partition_key, payload FROM pipeline.trip_log
       WHERE stream_name = $1 AND seq > $2
       ORDER BY seq
       LIMIT $3`,
      [streamName, afterSequence ?? '0', limit],
    );
    return rows.map((row) => ({
      kinesis: {
        data: row.payload.toString('base64'),
        partitionKey: row.partition_key,
        sequenceNumber: String(row.seq),
      },
    }));
  }

  async getOffset(streamName: string, consumer: string): Promise<string | null> {
    const { rows } = await this.db.query<{ seq: string }>(
      `SELECT seq FROM pipeline.trip_log_offsets WHERE stream_name = $1 AND consumer = $2`,
      [streamName, consumer],
    );
    return rows[0] ? String(rows[0].seq) : null;
  }

  async commitOffset(streamName: string, consumer: string, sequenceNumber: string): Promise<void> {
    await this.db.query(
      `INSERT INTO pipeline.trip_log_offsets (stream_name, consumer, seq, updated_at)
       VALUES ($1, $2, $3, NOW())
       ON CONFLICT (stream_name, consumer)
       DO UPDATE SET seq = GREATEST(pipeline.trip_log_offsets.seq, EXCLUDED.seq), updated_at = NOW()`,
      [streamName, consumer, sequenceNumber],
    );
  }
}
