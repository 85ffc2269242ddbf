import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ObjectStorePort, TripIngestionPort } from '@ride-pipeline/domain';

const UPLOAD_SUFFIX = '.csv';

export interface UploadsRouterDeps {
  objectStore: ObjectStorePort;
  ingestor: TripIngestionPort;
  bucketName: string;
}

function objectKey(req: Request): string {
  return decodeURIComponent(req.path.replace(/^\/+/, ''));
}

/**
 * PUT /api/uploads/<key>: stores a trip file in the upload bucket. Keys ending
 * in `.csv` then raise an object-created notification, the way the bucket's
 * suffix filter would.
 */
export function createUploadsRouter(deps: UploadsRouterDeps): Router {
  const router = Router();
  router.use(express.text({ type: () => true, limit: '50mb' }));

  router.put('/*', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = objectKey(req);
      if (!key) {
        res.status(400).json({ error: 'object key required' });
        return;
      }
      const body = typeof req.body === 'string' ? req.body : '';
      const contentType = req.get('content-type') ?? 'text/csv';
      await deps.objectStore.putObject(deps.bucketName, key, body, contentType);

      if (!key.endsWith(UPLOAD_SUFFIX)) {
        res.status(201).json({ bucket: deps.bucketName, key, ingest: null });
        return;
      }

      const ingest = await deps.ingestor.handle({
        Records: [
          {
            s3: {
              bucket: { name: deps.bucketName },
              object: { key: encodeURIComponent(key), size: Buffer.byteLength(body) },
            },
          },
        ],
      });
      res.status(201).json({ bucket: deps.bucketName, key, ingest });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/uploads/<key>: reads a stored file back with its content type */
  router.get('/*', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = objectKey(req);
      if (!key) {
        res.status(400).json({ error: 'object key required' });
        return;
      }
      const meta = await deps.objectStore.headObject(deps.bucketName, key);
      if (!meta) {
        res.status(404).json({ error: `Object not found: ${deps.bucketName}/${key}` });
        return;
      }
      const body = await deps.objectStore.getObject(deps.bucketName, key);
      res
        .type(meta.contentType)
        .set('Last-Modified', meta.updatedAt.toUTCString())
        .send(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
