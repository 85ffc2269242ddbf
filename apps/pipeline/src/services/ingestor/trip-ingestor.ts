import { UNKNOWN_TRIP_ID } from '@ride-pipeline/domain';
import type {
  AppendLogPort,
  IngestResult,
  ObjectNotificationEvent,
  ObjectNotificationRecord,
  ObjectStorePort,
  TripIngestionPort,
  TripRow,
} from '@ride-pipeline/domain';
import { errorMessage } from '../../errors.js';
import { parseTripRows } from './trip-row.parser.js';

export interface TripIngestorDeps {
  objectStore: ObjectStorePort;
  log: AppendLogPort;
  /** Target log stream; the ingestor refuses to run without one. */
  streamName?: string;
}

export interface FileIngestSummary {
  key: string;
  rows: number;
  failed: number;
}

/**
 * Reads uploaded trip files and appends one log record per row, partitioned by trip.
 * A file that fails to load or parse is skipped; a row whose append fails is skipped.
 */
export class TripIngestor implements TripIngestionPort {
  constructor(private readonly deps: TripIngestorDeps) {}

  async handle(event: ObjectNotificationEvent): Promise<IngestResult> {
    console.log(`[ingestor] invoked with ${event.Records.length} notification(s)`);

    const streamName = this.deps.streamName;
    if (!streamName) {
      console.error('[ingestor] TRIP_STREAM_NAME is not set');
      return { status: 'error', message: 'Stream name not configured' };
    }

    for (const record of event.Records) {
      const rawKey = record.s3.object.key;
      try {
        const { bucket, key } = notificationTarget(record);
        console.log(`[ingestor] new file detected: ${bucket}/${key}`);
        const summary = await this.ingestFile(streamName, bucket, key);
        console.log(
          `[ingestor] processed ${summary.rows} rows from file ${summary.key}` +
            (summary.failed ? ` (${summary.failed} append(s) failed)` : ''),
        );
      } catch (err) {
        console.error(`[ingestor] error processing file ${rawKey}: ${errorMessage(err)}`);
      }
    }

    console.log('[ingestor] invocation completed');
    return { status: 'done' };
  }

  async ingestFile(streamName: string, bucket: string, key: string): Promise<FileIngestSummary> {
    const body = await this.deps.objectStore.getObject(bucket, key);
    const rows = parseTripRows(body.toString('utf-8'));

    let failed = 0;
    for (const [index, row] of rows.entries()) {
      const tripId = partitionKeyFor(row);
      try {
        const receipt = await this.deps.log.append(
          streamName,
          Buffer.from(JSON.stringify(row), 'utf-8'),
          tripId,
        );
        console.log(`[ingestor] sent trip_id ${tripId} to ${streamName} seq=${receipt.sequenceNumber}`);
      } catch (err) {
        failed += 1;
        console.error(`[ingestor] failed to append row ${index + 1} (trip_id ${tripId}): ${errorMessage(err)}`);
      }
    }

    return { key, rows: rows.length, failed };
  }
}

export function partitionKeyFor(row: TripRow): string {
  return row.trip_id ?? UNKNOWN_TRIP_ID;
}

/** Notification keys arrive URL-encoded, with `+` for spaces. */
export function notificationTarget(record: ObjectNotificationRecord): { bucket: string; key: string } {
  return {
    bucket: record.s3.bucket.name,
    key: decodeURIComponent(record.s3.object.key.replace(/\+/g, ' ')),
  };
}
