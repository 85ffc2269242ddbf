import { z } from 'zod';
import type { LogBatchItem, TripRecord } from '@ride-pipeline/domain';
import { PayloadError, errorMessage } from '../../errors.js';

const payloadSchema = z.record(z.unknown());

export interface TripUpdate {
  tripId: string;
  fields: Record<string, unknown>;
}

/** Decodes a log record into the trip it updates. Throws PayloadError when it cannot. */
export function decodeTripUpdate(item: LogBatchItem): TripUpdate {
  const text = Buffer.from(item.kinesis.data, 'base64').toString('utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new PayloadError(`Payload is not valid JSON: ${errorMessage(err)}`);
  }

  const result = payloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new PayloadError('Payload is not a mapping');
  }

  const fields = result.data;
  const tripId = fields['trip_id'];
  if (typeof tripId === 'string') return { tripId, fields };
  if (typeof tripId === 'number' && Number.isFinite(tripId)) return { tripId: String(tripId), fields };
  if (tripId === undefined || tripId === null) throw new PayloadError('Payload has no trip_id');
  throw new PayloadError(`Payload trip_id has unsupported type ${typeof tripId}`);
}

/**
 * Shallow merge: incoming fields replace stored ones key by key, fields absent
 * from the update are kept. `id` is re-applied last so no payload can move the record.
 */
export function mergeTripRecord(
  existing: TripRecord | null,
  fields: Record<string, unknown>,
  tripId: string,
): TripRecord {
  return { ...(existing ?? {}), ...fields, id: tripId };
}
