import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TripMergePort } from '@ride-pipeline/domain';

const logBatchSchema = z.object({
  Records: z.array(
    z.object({
      kinesis: z.object({
        data: z.string(),
        partitionKey: z.string(),
        sequenceNumber: z.string(),
      }),
    }),
  ),
});

export function createMergeRouter(merger: TripMergePort): Router {
  const router = Router();

  /** POST /api/merge/records: a batch of log records pushed by the log host */
  router.post('/records', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const batch = logBatchSchema.parse(req.body);
      res.json(await merger.handle(batch));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
