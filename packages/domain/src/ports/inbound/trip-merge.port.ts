import type { LogBatch } from '../../entities/log-record.js';

export interface MergeResult {
  status: 'ok';
  merged: number;
  failed: number;
}

export interface TripMergePort {
  handle(batch: LogBatch): Promise<MergeResult>;
}
