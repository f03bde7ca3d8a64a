/**
 * Serves assets from an embedded store for GET and HEAD requests.
 *
 * For a request under the mount path the handler tries, in order:
 *   1. `<key>.br` when the client accepts `br`
 *   2. `<key>.gz` when the client accepts `gzip`
 *   3. `<key>`
 *   4. the same three for `<key>/index.html`, for directory-like paths
 *      when `serveIndexHtml` is on
 * and declines when nothing matches. Failures after an asset was found
 * produce a 500; they are never passed on to the next handler.
 */

import {
  resolveHandlerConfig,
  type HandlerConfig,
  type HandlerOptions,
} from '../config/handler-config.js';
import { logError, toError } from '../errors/index.js';
import { indexKeyFor, isWithinMount, resolveAssetKey } from '../resolve/asset-key.js';
import { acceptedVariants, variantKey, type CompressedVariant } from '../resolve/encoding.js';
import {
  buildAssetResponse,
  internalErrorResponse,
  isServableMethod,
  methodNotAllowedResponse,
  type ServableMethod,
} from '../response/asset-response.js';
import type { AssetHandle } from '../store/types.js';
import { declined, served, type Handler, type HandlerOutcome } from './types.js';

interface Candidate {
  storeKey: string;
  encoding?: CompressedVariant['encoding'];
}

export class AssetResolver implements Handler {
  constructor(private readonly config: HandlerConfig) {}

  async handle(request: Request): Promise<HandlerOutcome> {
    const { mountPath, fallthroughOnMiss, serveIndexHtml, logger } = this.config;
    const path = new URL(request.url).pathname;

    if (!isWithinMount(path, mountPath)) {
      return declined('out-of-scope');
    }

    const method = request.method;
    if (!isServableMethod(method)) {
      return fallthroughOnMiss ? declined('method') : served(methodNotAllowedResponse());
    }

    const resolution = resolveAssetKey(path, mountPath);
    if (!resolution.ok) {
      logger.debug('Rejected asset path', { path, reason: resolution.reason });
      return declined(resolution.reason);
    }

    const variants = acceptedVariants(request.headers.get('Accept-Encoding'));

    if (!resolution.isRoot) {
      const response = await this.serveKey(resolution.key, method, variants);
      if (response) {
        return served(response);
      }
    }

    if (serveIndexHtml && (resolution.directoryRequest || resolution.isRoot)) {
      const response = await this.serveKey(indexKeyFor(resolution.key), method, variants);
      if (response) {
        return served(response);
      }
    }

    return declined('not-found');
  }

  /**
   * Serve the first existing candidate for `key`, or null when none exists
   */
  private async serveKey(
    key: string,
    method: ServableMethod,
    variants: CompressedVariant[]
  ): Promise<Response | null> {
    const { store, logger } = this.config;
    const candidates: Candidate[] = [
      ...variants.map(variant => ({ storeKey: variantKey(key, variant), encoding: variant.encoding })),
      { storeKey: key },
    ];

    for (const candidate of candidates) {
      logger.debug('Attempting to serve asset', { key: candidate.storeKey });

      let exists: boolean;
      try {
        exists = await store.exists(candidate.storeKey);
      } catch (error) {
        logError(toError(error), { key: candidate.storeKey, operation: 'exists' }, logger);
        return internalErrorResponse();
      }

      if (exists) {
        return this.serveAsset(candidate, key, method);
      }
    }

    logger.debug('Asset not found', { key });
    return null;
  }

  private async serveAsset(
    { storeKey, encoding }: Candidate,
    contentKey: string,
    method: ServableMethod
  ): Promise<Response> {
    const { store, cacheControl, logger } = this.config;
    let handle: AssetHandle | undefined;

    try {
      handle = await store.open(storeKey);
      const response = await buildAssetResponse({
        handle,
        method,
        contentKey,
        encoding,
        cacheControl,
      });
      logger.debug('Served asset', { key: storeKey, method });
      return response;
    } catch (error) {
      logError(toError(error), { key: storeKey, operation: 'serve' }, logger);
      return internalErrorResponse();
    } finally {
      if (handle) {
        await this.release(handle, storeKey);
      }
    }
  }

  private async release(handle: AssetHandle, storeKey: string): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      logError(toError(error), { key: storeKey, operation: 'close' }, this.config.logger);
    }
  }
}

export function createAssetResolver(options: HandlerOptions): AssetResolver {
  return new AssetResolver(resolveHandlerConfig(options));
}
