import { posix } from 'node:path';
import mime from 'mime-types';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * MIME type for an asset key, from its own extension.
 * Pass the uncompressed key when serving a `.br`/`.gz` variant.
 */
export function contentTypeFor(key: string): string {
  const extension = posix.extname(key);
  if (!extension) {
    return DEFAULT_CONTENT_TYPE;
  }
  return mime.lookup(extension) || DEFAULT_CONTENT_TYPE;
}
