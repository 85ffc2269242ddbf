import 'dotenv/config';
import { uploadFile } from './uploader.js';

/**
 * Trip uploader: pushes local CSV trip files into the pipeline's upload bucket.
 *
 * Usage: trip-uploader <file.csv> [more.csv ...]
 *
 * Env vars:
 *   PIPELINE_BASE_URL: base URL of the pipeline service (default: http://localhost:3001)
 *   UPLOAD_PREFIX:     key prefix inside the upload bucket (default: uploads/)
 */

const PIPELINE_BASE_URL = process.env['PIPELINE_BASE_URL'] ?? 'http://localhost:3001';
const UPLOAD_PREFIX = process.env['UPLOAD_PREFIX'] ?? 'uploads/';

async function main(files: string[]): Promise<number> {
  if (files.length === 0) {
    console.error('[uploader] usage: trip-uploader <file.csv> [more.csv ...]');
    return 2;
  }

  let failures = 0;
  for (const file of files) {
    try {
      const outcome = await uploadFile(file, { baseUrl: PIPELINE_BASE_URL, prefix: UPLOAD_PREFIX });
      if (outcome.ok) {
        console.log(`[uploader] ${file} -> ${outcome.key} (${outcome.status})`);
      } else {
        failures += 1;
        console.error(`[uploader] ${file} rejected ${outcome.status}: ${outcome.body}`);
      }
    } catch (err) {
      failures += 1;
      console.error(`[uploader] ${file} failed`, err instanceof Error ? err.message : err);
    }
  }
  return failures ? 1 : 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[uploader] fatal error', err);
    process.exitCode = 1;
  });
