import 'dotenv/config';
import { createServer } from 'http';
import {
  applySchema,
  closePool,
  FsObjectStore,
  getPool,
  PgTripLog,
  PgTripStore,
} from '@ride-pipeline/adapters';
import { buildApp } from './app.js';
import { loadPipelineConfig } from './config/pipeline-config.js';
import { TripIngestor } from './services/ingestor/trip-ingestor.js';
import { TripMerger } from './services/merger/trip-merger.js';
import { KpiAggregator } from './services/aggregator/kpi-aggregator.js';
import { LogConsumer } from './services/runtime/log-consumer.js';
import { AggregationScheduler } from './services/runtime/aggregation-scheduler.js';

async function main() {
  const config = loadPipelineConfig();

  // Verify DB connection and create tables
  await getPool().query('SELECT 1');
  await applySchema(config.TRIP_TABLE_NAME ? [config.TRIP_TABLE_NAME] : []);
  console.log('[server] database connected');

  const objectStore = new FsObjectStore(config.OBJECT_STORE_ROOT);
  const tripLog = new PgTripLog();
  const openStore = (tableName: string) => new PgTripStore(tableName);

  const ingestor = new TripIngestor({ objectStore, log: tripLog, streamName: config.TRIP_STREAM_NAME });
  const merger = new TripMerger({ openStore, tableName: config.TRIP_TABLE_NAME });
  const aggregator = new KpiAggregator({
    openStore,
    objectStore,
    tableName: config.TRIP_TABLE_NAME,
    bucketName: config.KPI_BUCKET_NAME,
  });

  const consumer = config.TRIP_STREAM_NAME
    ? new LogConsumer(tripLog, merger, {
        streamName: config.TRIP_STREAM_NAME,
        consumerName: config.MERGE_CONSUMER_NAME,
        batchSize: config.MERGE_BATCH_SIZE,
        pollIntervalMs: config.MERGE_POLL_INTERVAL_MS,
      })
    : null;
  if (!consumer) console.warn('[server] TRIP_STREAM_NAME is not set; log consumer disabled');
  consumer?.start();

  const scheduler = new AggregationScheduler(aggregator, config.AGGREGATE_INTERVAL_MS);
  scheduler.start();

  const app = buildApp({
    ingestor,
    merger,
    aggregator,
    objectStore,
    uploadBucket: config.UPLOAD_BUCKET_NAME,
    corsOrigin: config.CORS_ORIGIN,
  });
  const httpServer = createServer(app);

  httpServer.listen(config.PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.PORT}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    consumer?.stop();
    scheduler.stop();
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
