import { AssetNotFoundError, ConfigError } from '../errors/index.js';
import type { AssetHandle, AssetStore } from './types.js';

type StoredAsset = { bytes: Uint8Array } | { base64: string };

const encoder = new TextEncoder();

function storageKey(key: string): string {
  return key.replace(/^\/+/, '');
}

function bytesStream(bytes: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (bytes.byteLength > 0) {
        controller.enqueue(bytes);
      }
      controller.close();
    },
  });
}

/**
 * Read-only in-memory asset store. Contents are fixed at construction.
 *
 * Keys given with a leading slash (`/index.html`) are stored without it.
 */
export class EmbeddedAssetStore implements AssetStore {
  private readonly assets = new Map<string, StoredAsset>();
  private readonly decodedBodyCache = new Map<string, Uint8Array>();

  constructor(assets: Map<string, Uint8Array | string> | Record<string, Uint8Array | string> = {}) {
    const entries = assets instanceof Map ? assets.entries() : Object.entries(assets);
    for (const [key, body] of entries) {
      this.assets.set(storageKey(key), {
        bytes: typeof body === 'string' ? encoder.encode(body) : body,
      });
    }
  }

  /**
   * Build a store from a base64 manifest (see `AssetManifest`), typically
   * parsed JSON. Bodies are decoded on first open.
   */
  static fromManifest(manifest: unknown): EmbeddedAssetStore {
    if (typeof manifest !== 'object' || manifest === null || Array.isArray(manifest)) {
      throw new ConfigError('Asset manifest must be an object');
    }

    const store = new EmbeddedAssetStore();
    for (const [key, entry] of Object.entries(manifest)) {
      store.assets.set(storageKey(key), { base64: manifestBase64(key, entry) });
    }
    return store;
  }

  get size(): number {
    return this.assets.size;
  }

  keys(): string[] {
    return [...this.assets.keys()];
  }

  exists(key: string): boolean {
    return this.assets.has(key);
  }

  async open(key: string): Promise<AssetHandle> {
    const bytes = this.read(key);
    const body = bytesStream(bytes);

    return {
      size: bytes.byteLength,
      body,
      async close() {
        if (!body.locked) {
          await body.cancel();
        }
      },
    };
  }

  private read(key: string): Uint8Array {
    const asset = this.assets.get(key);
    if (!asset) {
      throw new AssetNotFoundError(key);
    }
    if ('bytes' in asset) {
      return asset.bytes;
    }

    const cached = this.decodedBodyCache.get(key);
    if (cached) {
      return cached;
    }

    const decoded = new Uint8Array(Buffer.from(asset.base64, 'base64'));
    this.decodedBodyCache.set(key, decoded);
    return decoded;
  }
}

function manifestBase64(key: string, entry: unknown): string {
  if (typeof entry === 'string') {
    return entry;
  }
  if (
    typeof entry === 'object' &&
    entry !== null &&
    'base64' in entry &&
    typeof entry.base64 === 'string'
  ) {
    return entry.base64;
  }
  throw new ConfigError(`Invalid manifest entry for asset: ${key}`, { key });
}
