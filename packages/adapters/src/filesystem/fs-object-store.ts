import { mkdir, readFile, writeFile, rename } from 'fs/promises';
import path from 'path';
import type { ObjectStorePort, StoredObjectMetadata } from '@ride-pipeline/domain';

const META_DIR = '.meta';

interface MetadataFile {
  contentType: string;
  size: number;
  updatedAt: string;
}

export class ObjectNotFoundError extends Error {
  readonly status = 404;

  constructor(bucket: string, key: string) {
    super(`Object not found: ${bucket}/${key}`);
    this.name = 'ObjectNotFoundError';
  }
}

/**
 * Object store on the local filesystem: each bucket is a directory under `root`,
 * each key a path inside it. Content types live in a `.meta/<key>.json` sidecar.
 */
export class FsObjectStore implements ObjectStorePort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async getObject(bucket: string, key: string): Promise<Buffer> {
    try {
      return await readFile(this.objectPath(bucket, key));
    } catch (err) {
      if (isNotFound(err)) throw new ObjectNotFoundError(bucket, key);
      throw err;
    }
  }

  async putObject(
    bucket: string,
    key: string,
    body: Buffer | string,
    contentType: string,
  ): Promise<void> {
    const data = typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;
    const meta: MetadataFile = {
      contentType,
      size: data.length,
      updatedAt: new Date().toISOString(),
    };
    await writeAtomic(this.objectPath(bucket, key), data);
    await writeAtomic(this.metaPath(bucket, key), JSON.stringify(meta));
  }

  async headObject(bucket: string, key: string): Promise<StoredObjectMetadata | null> {
    let raw: string;
    try {
      raw = await readFile(this.metaPath(bucket, key), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    const meta: unknown = JSON.parse(raw);
    if (!isMetadataFile(meta)) throw new Error(`Corrupt metadata for ${bucket}/${key}`);
    return { contentType: meta.contentType, size: meta.size, updatedAt: new Date(meta.updatedAt) };
  }

  private objectPath(bucket: string, key: string): string {
    const dir = this.bucketDir(bucket);
    const target = this.resolveInside(dir, key);
    const metaDir = path.join(dir, META_DIR);
    if (target === metaDir || isWithin(metaDir, target)) {
      throw new Error(`Invalid object key: ${key}`);
    }
    return target;
  }

  private metaPath(bucket: string, key: string): string {
    return this.resolveInside(path.join(this.bucketDir(bucket), META_DIR), `${key}.json`);
  }

  private bucketDir(bucket: string): string {
    if (!bucket || bucket.includes('/') || bucket.includes('\\') || bucket.startsWith('.')) {
      throw new Error(`Invalid bucket name: ${bucket}`);
    }
    return path.join(this.root, bucket);
  }

  private resolveInside(dir: string, key: string): string {
    const target = path.resolve(dir, key);
    if (!key || !isWithin(dir, target)) {
      throw new Error(`Invalid object key: ${key}`);
    }
    return target;
  }
}

async function writeAtomic(file: string, data: Buffer | string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await writeFile(tmp, data);
  await rename(tmp, file);
}

function isWithin(dir: string, target: string): boolean {
  return target.startsWith(dir + path.sep);
}

// fs errors may come from another realm, so no instanceof check.
function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function isMetadataFile(value: unknown): value is MetadataFile {
  if (typeof value !== 'object' || value === null) return false;
  const meta: Record<string, unknown> = { ...value };
  return (
    typeof meta['contentType'] === 'string' &&
    typeof meta['size'] === 'number' &&
    typeof meta['updatedAt'] === 'string'
  );
}
