import { KPI_REQUIRED_FIELDS } from '@ride-pipeline/domain';
import type {
  KpiAggregationPort,
  ObjectStorePort,
  TripRecord,
  TripStoreFactory,
  TripStorePort,
} from '@ride-pipeline/domain';
import { ConfigurationError, errorMessage } from '../../errors.js';
import { planKpiObjects } from './kpi.js';

export interface KpiAggregatorDeps {
  openStore: TripStoreFactory;
  objectStore: ObjectStorePort;
  tableName?: string;
  bucketName?: string;
}

/**
 * Scheduled fare summary. Scans every trip carrying both fare fields, then writes
 * one JSON object per pickup-timestamp group. Any failure fails the whole run;
 * objects written before it stay written.
 */
export class KpiAggregator implements KpiAggregationPort {
  constructor(private readonly deps: KpiAggregatorDeps) {}

  async run(): Promise<void> {
    console.log('[aggregator] run started');
    try {
      const { tableName, bucketName } = this.deps;
      if (!tableName) throw new ConfigurationError('Trip table name not configured');
      if (!bucketName) throw new ConfigurationError('KPI bucket name not configured');

      const items = await scanAll(this.deps.openStore(tableName));
      console.log(`[aggregator] retrieved ${items.length} item(s) from ${tableName}`);
      if (items.length === 0) {
        console.warn('[aggregator] no items found matching the filter');
        return;
      }

      const objects = planKpiObjects(items);
      console.log(`[aggregator] computed ${objects.length} KPI group(s)`);
      for (const { key, kpi } of objects) {
        console.log(`[aggregator] uploading KPI for ${kpi.pickup_datetime} to ${bucketName}/${key}`);
        await this.deps.objectStore.putObject(bucketName, key, JSON.stringify(kpi), 'application/json');
      }
      console.log('[aggregator] all KPIs uploaded');
    } catch (err) {
      console.error(`[aggregator] run failed: ${errorMessage(err)}`);
      throw err;
    }
  }
}

/** Follows continuation keys until the store reports no more pages. */
export async function scanAll(store: TripStorePort): Promise<TripRecord[]> {
  const items: TripRecord[] = [];
  let startKey: string | undefined;
  do {
    const page = await store.scan({ requiredFields: KPI_REQUIRED_FIELDS }, startKey);
    items.push(...page.items);
    startKey = page.lastEvaluatedKey;
  } while (startKey !== undefined);
  return items;
}
