/** Partition key used when a row carries no `trip_id`. */
export const UNKNOWN_TRIP_ID = 'unknown';

/**
 * One parsed line of an uploaded trip file. Column names come verbatim from the
 * header row; the known trip columns are typed, every other column passes through.
 */
export interface TripRow {
  readonly trip_id?: string;
  readonly pickup_datetime?: string;
  readonly fare_amount?: string;
  readonly estimated_fare_amount?: string;
  readonly [column: string]: string | undefined;
}
