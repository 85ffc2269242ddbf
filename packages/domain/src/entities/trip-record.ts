/**
 * A trip as persisted in the keyed store. `id` equals the trip's `trip_id` and
 * never changes; every other field is last-write-wins across merges.
 */
export interface TripRecord {
  readonly id: string;
  readonly [field: string]: unknown;
}

/** Fields a record must carry to count towards fare statistics. */
export const KPI_REQUIRED_FIELDS = ['fare_amount', 'estimated_fare_amount'] as const;
