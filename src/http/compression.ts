import { gzipSync } from 'node:zlib';

export const DEFAULT_COMPRESSION_THRESHOLD = 1024;

/**
 * Compress data using gzip if it is at least `threshold` bytes long.
 */
export function compressIfNeeded(
  data: string,
  threshold: number = DEFAULT_COMPRESSION_THRESHOLD
): { data: Buffer | string; isCompressed: boolean } {
  if (Buffer.byteLength(data, 'utf8') < threshold) {
    return { data, isCompressed: false };
  }
  return { data: gzipSync(data), isCompressed: true };
}

/**
 * Check if the Accept-Encoding header allows gzip.
 *
 * `gzip;q=0` is an explicit refusal; `*` counts as acceptance.
 */
export function acceptsGzip(acceptEncoding?: string): boolean {
  if (!acceptEncoding) {
    return false;
  }

  for (const part of acceptEncoding.split(',')) {
    const [coding = '', ...params] = part.split(';').map((s) => s.trim().toLowerCase());
    if (coding !== 'gzip' && coding !== 'x-gzip' && coding !== '*') {
      continue;
    }

    const q = params.find((p) => p.startsWith('q='));
    if (q === undefined || Number(q.slice(2)) > 0) {
      return true;
    }
  }

  return false;
}
