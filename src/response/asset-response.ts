import { StoreError } from '../errors/index.js';
import type { CompressedVariant } from '../resolve/encoding.js';
import type { AssetHandle } from '../store/types.js';
import { contentTypeFor } from './content-type.js';

export type ServableMethod = 'GET' | 'HEAD';

export const ALLOWED_METHODS: readonly ServableMethod[] = ['GET', 'HEAD'];

export const SERVE_ERROR_BODY = 'Error serving file.';

export interface AssetResponseInit {
  handle: AssetHandle;
  method: ServableMethod;
  /** Uncompressed key; decides the content type */
  contentKey: string;
  encoding?: CompressedVariant['encoding'];
  cacheControl: string | null;
}

export function isServableMethod(method: string): method is ServableMethod {
  return method === 'GET' || method === 'HEAD';
}

function buildHeaders({ contentKey, encoding, cacheControl, handle }: AssetResponseInit): Headers {
  const headers = new Headers({ 'Content-Type': contentTypeFor(contentKey) });
  if (encoding) {
    headers.set('Content-Encoding', encoding);
  }
  if (cacheControl !== null) {
    headers.set('Cache-Control', cacheControl);
  }
  headers.set('Content-Length', String(handle.size));
  return headers;
}

/**
 * Read the whole body. A body whose length differs from the announced size
 * is a store defect.
 */
async function readBody(handle: AssetHandle): Promise<Uint8Array> {
  const reader = handle.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      chunks.push(value);
      total += value.byteLength;
    }
  } finally {
    reader.releaseLock();
  }

  if (total !== handle.size) {
    throw new StoreError('Asset size mismatch', { expected: handle.size, actual: total });
  }

  const body = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

/**
 * Build the 200 response for an opened asset. HEAD gets the headers only.
 * The caller still owns (and closes) the handle.
 */
export async function buildAssetResponse(init: AssetResponseInit): Promise<Response> {
  const headers = buildHeaders(init);

  if (init.method === 'HEAD') {
    return new Response(null, { status: 200, headers });
  }

  const body = await readBody(init.handle);
  return new Response(body, { status: 200, headers });
}

export function methodNotAllowedResponse(): Response {
  return new Response(null, {
    status: 405,
    headers: { Allow: ALLOWED_METHODS.join(', ') },
  });
}

export function internalErrorResponse(): Response {
  return new Response(SERVE_ERROR_BODY, {
    status: 500,
    headers: { 'Content-Type': 'text/plain' },
  });
}
