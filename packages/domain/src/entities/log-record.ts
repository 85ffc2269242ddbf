export interface AppendReceipt {
  readonly sequenceNumber: string;
}

/**
 * A record as delivered to a consumer. `data` is the payload, base64-encoded.
 */
export interface LogBatchItem {
  readonly kinesis: {
    readonly data: string;
    readonly partitionKey: string;
    readonly sequenceNumber: string;
  };
}

export interface LogBatch {
  readonly Records: LogBatchItem[];
}
