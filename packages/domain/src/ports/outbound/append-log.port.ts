import type { AppendReceipt, LogBatchItem } from '../../entities/log-record.js';

export interface AppendLogPort {
  append(streamName: string, payload: Buffer, partitionKey: string): Promise<AppendReceipt>;
}

/** Read side of the log, used by hosts that poll instead of being pushed batches. */
export interface LogReaderPort {
  readBatch(streamName: string, afterSequence: string | null, limit: number): Promise<LogBatchItem[]>;
  getOffset(streamName: string, consumer: string): Promise<string | null>;
  commitOffset(streamName: string, consumer: string, sequenceNumber: string): Promise<void>;
}
