import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { KpiAggregationPort } from '@ride-pipeline/domain';

export function createAggregateRouter(aggregator: KpiAggregationPort): Router {
  const router = Router();

  /** POST /api/aggregate/run: out-of-schedule aggregation run */
  router.post('/run', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await aggregator.run();
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
