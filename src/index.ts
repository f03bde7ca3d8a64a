/**
 * Fetch-style middleware serving static assets from an in-memory embedded
 * store instead of the filesystem.
 *
 * ```ts
 * import { readFileSync } from 'node:fs';
 * import { EmbeddedAssetStore, createAssetResolver, createFetchHandler } from 'embedded-asset-handler';
 *
 * const store = EmbeddedAssetStore.fromManifest(JSON.parse(readFileSync('assets.json', 'utf8')));
 * const assets = createAssetResolver({ store, mountPath: '/assets' });
 *
 * export const fetch = createFetchHandler([assets], request => app.fetch(request));
 * ```
 */

export {
  DEFAULT_CACHE_CONTROL,
  DEFAULT_MOUNT_PATH,
  normalizeMountPath,
  resolveHandlerConfig,
} from './config/handler-config.js';
export type { HandlerConfig, HandlerOptions } from './config/handler-config.js';

export {
  AssetHandlerError,
  AssetNotFoundError,
  ConfigError,
  StoreError,
  consoleLogger,
  logError,
  silentLogger,
  toError,
} from './errors/index.js';
export type { Logger } from './errors/index.js';

export { EmbeddedAssetStore } from './store/embedded-store.js';
export type { AssetHandle, AssetManifest, AssetStore, EmbeddedAsset } from './store/types.js';

export { ROOT_KEY, indexKeyFor, isWithinMount, resolveAssetKey } from './resolve/asset-key.js';
export type { KeyRejection, KeyResolution } from './resolve/asset-key.js';
export {
  BROTLI,
  COMPRESSED_VARIANTS,
  GZIP,
  acceptedVariants,
  parseAcceptEncoding,
} from './resolve/encoding.js';
export type { CompressedVariant } from './resolve/encoding.js';

export { DEFAULT_CONTENT_TYPE, contentTypeFor } from './response/content-type.js';

export { AssetResolver, createAssetResolver } from './handler/asset-resolver.js';
export { createFetchHandler, notFoundResponse } from './handler/chain.js';
export type { Fallback, FetchHandler } from './handler/chain.js';
export { declined, served } from './handler/types.js';
export type { DeclineReason, Handler, HandlerOutcome } from './handler/types.js';
