/**
 * Contract between the handler and the embedded asset store.
 *
 * Keys are POSIX-style relative paths without a leading slash
 * (`css/site.css`, `index.html`).
 */

/**
 * An opened asset. The caller must `close()` it once done, whether or not
 * the body was read.
 */
export interface AssetHandle {
  /** Size of the stored bytes */
  readonly size: number;
  /** Stored bytes, as stored (compressed variants stay compressed) */
  readonly body: ReadableStream<Uint8Array>;
  close(): void | Promise<void>;
}

export interface AssetStore {
  exists(key: string): boolean | Promise<boolean>;
  /** Rejects with `AssetNotFoundError` when the key has no entry */
  open(key: string): Promise<AssetHandle>;
}

/**
 * Base64 manifest entry as produced by an asset bundling step
 */
export interface EmbeddedAsset {
  /** Base64-encoded body contents */
  base64: string;
}

export type AssetManifest = Record<string, EmbeddedAsset | string>;
