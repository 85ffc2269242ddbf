import type {
  LogBatch,
  LogBatchItem,
  MergeResult,
  TripMergePort,
  TripStoreFactory,
  TripStorePort,
} from '@ride-pipeline/domain';
import { ConfigurationError, errorMessage } from '../../errors.js';
import { decodeTripUpdate, mergeTripRecord } from './trip-merge.js';

export interface TripMergerDeps {
  openStore: TripStoreFactory;
  tableName?: string;
}

/**
 * Folds log records into the keyed trip store. Each record is handled on its own:
 * a bad one is logged and skipped, the rest of the batch still merges.
 */
export class TripMerger implements TripMergePort {
  constructor(private readonly deps: TripMergerDeps) {}

  async handle(batch: LogBatch): Promise<MergeResult> {
    const tableName = this.deps.tableName;
    if (!tableName) {
      throw new ConfigurationError('Trip table name not configured');
    }
    const store = this.deps.openStore(tableName);

    console.log(`[merger] triggered with ${batch.Records.length} record(s)`);

    let merged = 0;
    let failed = 0;
    for (const item of batch.Records) {
      try {
        await this.mergeOne(store, item);
        merged += 1;
      } catch (err) {
        failed += 1;
        console.error(
          `[merger] failed to process record seq=${item.kinesis.sequenceNumber} ` +
            `partition=${item.kinesis.partitionKey}: ${errorMessage(err)}`,
        );
      }
    }

    if (failed) console.warn(`[merger] ${failed} of ${batch.Records.length} record(s) skipped`);
    return { status: 'ok', merged, failed };
  }

  private async mergeOne(store: TripStorePort, item: LogBatchItem): Promise<void> {
    const { tripId, fields } = decodeTripUpdate(item);
    const existing = await store.getItem(tripId);
    await store.putItem(mergeTripRecord(existing, fields, tripId));
    console.log(`[merger] merged and saved item for ${tripId}`);
  }
}
