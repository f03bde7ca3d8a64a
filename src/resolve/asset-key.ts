import { posix } from 'node:path';

/** Key of the mount root itself; never looked up directly */
export const ROOT_KEY = '.';

export const INDEX_FILE = 'index.html';

export type KeyRejection = 'out-of-scope' | 'bad-encoding' | 'traversal';

export type KeyResolution =
  | {
      ok: true;
      key: string;
      isRoot: boolean;
      /** Request path ended with `/` */
      directoryRequest: boolean;
    }
  | { ok: false; reason: KeyRejection };

/**
 * Whether a handler mounted at `mountPath` is responsible for `path`.
 * Prefix match is exact and case-sensitive.
 */
export function isWithinMount(path: string, mountPath: string): boolean {
  return mountPath === '/' || path.startsWith(mountPath);
}

/**
 * Map a raw (still percent-encoded) request path to a store key relative to
 * the mount path.
 *
 * The part after the mount prefix is percent-decoded, then normalized
 * lexically. Malformed escapes and NUL bytes are rejected as `bad-encoding`;
 * keys that would climb above the mount root are rejected as `traversal`.
 */
export function resolveAssetKey(path: string, mountPath: string): KeyResolution {
  if (!isWithinMount(path, mountPath)) {
    return { ok: false, reason: 'out-of-scope' };
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(path.slice(mountPath.length));
  } catch {
    return { ok: false, reason: 'bad-encoding' };
  }
  if (decoded.includes('\0')) {
    return { ok: false, reason: 'bad-encoding' };
  }

  const normalized = posix
    .normalize(decoded.replace(/^\/+/, ''))
    .replace(/\/+$/, '');
  const key = normalized === '' ? ROOT_KEY : normalized;

  if (key === '..' || key.startsWith('../')) {
    return { ok: false, reason: 'traversal' };
  }

  return {
    ok: true,
    key,
    isRoot: key === ROOT_KEY,
    directoryRequest: path.endsWith('/'),
  };
}

export function indexKeyFor(key: string): string {
  return key === ROOT_KEY ? INDEX_FILE : posix.normalize(`${key}/${INDEX_FILE}`);
}
