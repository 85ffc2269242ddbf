import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TripIngestionPort } from '@ride-pipeline/domain';

export const notificationEventSchema = z.object({
  Records: z.array(
    z.object({
      s3: z.object({
        bucket: z.object({ name: z.string().min(1) }),
        object: z.object({ key: z.string().min(1), size: z.number().optional() }),
      }),
    }),
  ),
});

export function createIngestRouter(ingestor: TripIngestionPort): Router {
  const router = Router();

  /** POST /api/ingest/notifications: object-created notifications from the upload bucket */
  router.post('/notifications', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const event = notificationEventSchema.parse(req.body);
      const result = await ingestor.handle(event);
      res.status(result.status === 'done' ? 200 : 500).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
