import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type {
  KpiAggregationPort,
  ObjectStorePort,
  TripIngestionPort,
  TripMergePort,
} from '@ride-pipeline/domain';

import { createIngestRouter } from './controllers/ingest.controller.js';
import { createMergeRouter } from './controllers/merge.controller.js';
import { createAggregateRouter } from './controllers/aggregate.controller.js';
import { createUploadsRouter } from './controllers/uploads.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface PipelineServices {
  ingestor: TripIngestionPort;
  merger: TripMergePort;
  aggregator: KpiAggregationPort;
  objectStore: ObjectStorePort;
  uploadBucket: string;
  corsOrigin?: string;
  /** Access log format; `false` disables it. */
  accessLog?: string | false;
}

export function buildApp(services: PipelineServices): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: services.corsOrigin ?? '*' }));
  if (services.accessLog !== false) app.use(morgan(services.accessLog ?? 'combined'));

  // Uploads take raw file bodies, so they mount ahead of the JSON parser.
  app.use(
    '/api/uploads',
    createUploadsRouter({
      objectStore: services.objectStore,
      ingestor: services.ingestor,
      bucketName: services.uploadBucket,
    }),
  );

  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/ingest', createIngestRouter(services.ingestor));
  app.use('/api/merge', createMergeRouter(services.merger));
  app.use('/api/aggregate', createAggregateRouter(services.aggregator));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
