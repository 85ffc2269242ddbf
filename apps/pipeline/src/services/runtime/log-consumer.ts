import type { LogReaderPort, TripMergePort } from '@ride-pipeline/domain';
import { errorMessage } from '../../errors.js';

export interface LogConsumerOptions {
  streamName: string;
  consumerName: string;
  batchSize: number;
  pollIntervalMs: number;
}

/**
 * Polls the trip log and feeds batches to the merger, committing the last
 * sequence number after each batch. A crash between merge and commit replays
 * the batch, so delivery is at-least-once.
 */
export class LogConsumer {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(
    private readonly reader: LogReaderPort,
    private readonly merger: TripMergePort,
    private readonly options: LogConsumerOptions,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(
      `[log-consumer] consuming ${this.options.streamName} as ${this.options.consumerName}` +
        ` batch=${this.options.batchSize}`,
    );
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Drains the log once; resolves with the number of records handed to the merger. */
  async drain(): Promise<number> {
    const { streamName, consumerName, batchSize } = this.options;
    let offset = await this.reader.getOffset(streamName, consumerName);
    let delivered = 0;

    for (;;) {
      const records = await this.reader.readBatch(streamName, offset, batchSize);
      const last = records[records.length - 1];
      if (!last) return delivered;

      await this.merger.handle({ Records: records });
      offset = last.kinesis.sequenceNumber;
      await this.reader.commitOffset(streamName, consumerName, offset);
      delivered += records.length;

      if (records.length < batchSize) return delivered;
    }
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      void this.poll();
    }, delayMs);
  }

  private async poll(): Promise<void> {
    try {
      const delivered = await this.drain();
      if (delivered) console.log(`[log-consumer] delivered ${delivered} record(s)`);
    } catch (err) {
      console.error(`[log-consumer] poll failed: ${errorMessage(err)}`);
    } finally {
      this.schedule(this.options.pollIntervalMs);
    }
  }
}
