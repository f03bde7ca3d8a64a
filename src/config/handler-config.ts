import { ConfigError, consoleLogger, type Logger } from '../errors/index.js';
import type { AssetStore } from '../store/types.js';

export const DEFAULT_CACHE_CONTROL = 'max-age=604800'; // 1 week
export const DEFAULT_MOUNT_PATH = '/';

export interface HandlerOptions {
  store: AssetStore;
  /**
   * When false, unsupported methods get a 405 instead of falling through.
   * Missing assets always fall through.
   * @default true
   */
  fallthroughOnMiss?: boolean;
  /**
   * Serve `index.html` for directory-like paths (`/docs/` → `docs/index.html`)
   * @default true
   */
  serveIndexHtml?: boolean;
  /**
   * `Cache-Control` value for served assets; `null` omits the header
   * @default 'max-age=604800'
   */
  cacheControl?: string | null;
  /**
   * Path prefix the handler is scoped to
   * @default '/'
   */
  mountPath?: string;
  logger?: Logger;
}

export interface HandlerConfig {
  readonly store: AssetStore;
  readonly fallthroughOnMiss: boolean;
  readonly serveIndexHtml: boolean;
  readonly cacheControl: string | null;
  /** Always ends with exactly one slash */
  readonly mountPath: string;
  readonly logger: Logger;
}

/**
 * Normalize a mount path to start with `/` and end with exactly one `/`
 */
export function normalizeMountPath(mountPath: string): string {
  if (!mountPath.startsWith('/')) {
    throw new ConfigError('Mount path must start with "/"', { mountPath });
  }
  return mountPath.replace(/\/+$/, '') + '/';
}

export function resolveHandlerConfig(options: HandlerOptions): HandlerConfig {
  return Object.freeze({
    store: options.store,
    fallthroughOnMiss: options.fallthroughOnMiss ?? true,
    serveIndexHtml: options.serveIndexHtml ?? true,
    cacheControl: options.cacheControl === undefined ? DEFAULT_CACHE_CONTROL : options.cacheControl,
    mountPath: normalizeMountPath(options.mountPath ?? DEFAULT_MOUNT_PATH),
    logger: options.logger ?? consoleLogger,
  });
}
