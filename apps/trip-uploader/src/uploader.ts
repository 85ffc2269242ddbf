import { readFile } from 'fs/promises';
import path from 'path';
import { fetch } from 'undici';

export interface UploadOptions {
  baseUrl: string;
  /** Key prefix inside the upload bucket, e.g. `uploads/`. */
  prefix: string;
}

export interface UploadOutcome {
  file: string;
  key: string;
  ok: boolean;
  status: number;
  body: string;
}

export type FetchLike = typeof fetch;

/** Object key for a local file: the prefix plus the file's base name. */
export function objectKeyFor(file: string, prefix: string): string {
  const normalized = prefix && !prefix.endsWith('/') ? `${prefix}/` : prefix;
  return `${normalized.replace(/^\/+/, '')}${path.basename(file)}`;
}

export function uploadUrl(baseUrl: string, key: string): string {
  const encoded = key.split('/').map(encodeURIComponent).join('/');
  return `${baseUrl.replace(/\/+$/, '')}/api/uploads/${encoded}`;
}

export async function uploadFile(
  file: string,
  options: UploadOptions,
  fetchImpl: FetchLike = fetch,
): Promise<UploadOutcome> {
  const key = objectKeyFor(file, options.prefix);
  const content = await readFile(file, 'utf-8');
  const resp = await fetchImpl(uploadUrl(options.baseUrl, key), {
    method: 'PUT',
    headers: { 'Content-Type': 'text/csv' },
    body: content,
  });
  return { file, key, ok: resp.ok, status: resp.status, body: await resp.text() };
}
