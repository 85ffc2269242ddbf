import type { TripRecord } from '../../entities/trip-record.js';

export interface TripScanFilter {
  /** Only records carrying every one of these fields are returned. */
  requiredFields: readonly string[];
}

export interface TripScanPage {
  items: TripRecord[];
  /** Present while more pages remain; pass it back as `startKey`. */
  lastEvaluatedKey?: string;
}

export interface TripStorePort {
  getItem(id: string): Promise<TripRecord | null>;
  putItem(item: TripRecord): Promise<void>;
  scan(filter: TripScanFilter, startKey?: string): Promise<TripScanPage>;
}

/** Opens the store for one table; stages call it once per invocation. */
export type TripStoreFactory = (tableName: string) => TripStorePort;
