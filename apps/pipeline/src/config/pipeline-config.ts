/**
 * Pipeline configuration, read from the environment.
 *
 * Stage settings (stream, table, bucket) are optional here: a missing one only
 * fails the stage that needs it, when that stage is invoked.
 */

import { z } from 'zod';

const optionalName = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  OBJECT_STORE_ROOT: z.string().default('./data/buckets'),
  UPLOAD_BUCKET_NAME: z.string().default('trip-uploads'),
  TRIP_STREAM_NAME: optionalName,
  TRIP_TABLE_NAME: optionalName,
  KPI_BUCKET_NAME: optionalName,
  MERGE_CONSUMER_NAME: z.string().default('trip-merger'),
  MERGE_BATCH_SIZE: z.coerce.number().int().min(1).max(10_000).default(100),
  MERGE_POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(1_000),
  AGGREGATE_INTERVAL_MS: z.coerce.number().int().min(1_000).default(60 * 60 * 1000),
});

export type PipelineConfig = z.infer<typeof envSchema>;

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return envSchema.parse(env);
}
