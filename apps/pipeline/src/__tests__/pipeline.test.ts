/**
 * End-to-end flow over in-process ports: upload → log → store → KPI bucket.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { TripIngestor } from '../services/ingestor/trip-ingestor.js';
import { TripMerger } from '../services/merger/trip-merger.js';
import { KpiAggregator } from '../services/aggregator/kpi-aggregator.js';
import { InMemoryObjectStore, InMemoryTripLog, InMemoryTripStore } from './fakes.js';

const UPLOADS = 'trip-uploads';
const KPIS = 'analytics-kpis';
const STREAM = 'trips-stream';

describe('pipeline round trip', () => {
  let objectStore: InMemoryObjectStore;
  let log: InMemoryTripLog;
  let store: InMemoryTripStore;
  let ingestor: TripIngestor;
  let merger: TripMerger;

  beforeEach(() => {
    objectStore = new InMemoryObjectStore();
    log = new InMemoryTripLog();
    store = new InMemoryTripStore();
    ingestor = new TripIngestor({ objectStore, log, streamName: STREAM });
    merger = new TripMerger({ openStore: () => store, tableName: 'trips' });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores each ingested row with exactly its fields plus id', async () => {
    await objectStore.putObject(
      UPLOADS,
      'rides.csv',
      'trip_id,pickup_datetime,fare_amount,vendor\nt-100,2025-04-22T08:30:00,20.0,acme\n',
      'text/csv',
    );

    await ingestor.handle({ Records: [{ s3: { bucket: { name: UPLOADS }, object: { key: 'rides.csv' } } }] });
    await merger.handle(log.batch());

    expect([...store.items.values()]).toEqual([
      {
        id: 't-100',
        trip_id: 't-100',
        pickup_datetime: '2025-04-22T08:30:00',
        fare_amount: '20.0',
        vendor: 'acme',
      },
    ]);
  });

  it('folds a later estimate file into the same trips and aggregates them', async () => {
    await objectStore.putObject(
      UPLOADS,
      'completed.csv',
      'trip_id,pickup_datetime,fare_amount\nt-1,2025-04-22T08:30:00,20.0\nt-2,2025-04-22T08:30:00,30.0\n',
      'text/csv',
    );
    await objectStore.putObject(
      UPLOADS,
      'estimates.csv',
      'trip_id,estimated_fare_amount\nt-1,21.0\nt-2,29.0\n',
      'text/csv',
    );

    await ingestor.handle({
      Records: ['completed.csv', 'estimates.csv'].map((key) => ({ s3: { bucket: { name: UPLOADS }, object: { key } } })),
    });
    await merger.handle(log.batch());
    await new KpiAggregator({ openStore: () => store, objectStore, tableName: 'trips', bucketName: KPIS }).run();

    expect(store.items.get('t-2')).toEqual({
      id: 't-2',
      trip_id: 't-2',
      pickup_datetime: '2025-04-22T08:30:00',
      fare_amount: '30.0',
      estimated_fare_amount: '29.0',
    });
    expect(JSON.parse(objectStore.text(KPIS, 'kpis/date=2025-04-22/kpi.json') ?? 'null')).toEqual({
      pickup_datetime: '2025-04-22T08:30:00.000Z',
      total_fare: 50,
      count_trips: 2,
      average_fare: 25,
      max_fare: 30,
      min_fare: 20,
    });
  });
});
