export interface CompressedVariant {
  /** `Content-Encoding` value and Accept-Encoding token */
  readonly encoding: 'br' | 'gzip';
  /** Appended to the asset key to find the pre-compressed copy */
  readonly suffix: '.br' | '.gz';
}

export const BROTLI: CompressedVariant = { encoding: 'br', suffix: '.br' };
export const GZIP: CompressedVariant = { encoding: 'gzip', suffix: '.gz' };

/** In order of preference */
export const COMPRESSED_VARIANTS: readonly CompressedVariant[] = [BROTLI, GZIP];

/**
 * Coding tokens named in an Accept-Encoding header, lowercased.
 * Quality values are ignored: `br;q=0` still counts as `br`.
 */
export function parseAcceptEncoding(header: string | null): Set<string> {
  const tokens = new Set<string>();
  if (!header) {
    return tokens;
  }

  for (const part of header.split(',')) {
    const token = part.split(';')[0].trim().toLowerCase();
    if (token) {
      tokens.add(token);
    }
  }
  return tokens;
}

/**
 * Compressed variants the client accepts, Brotli first regardless of the
 * client's weighting
 */
export function acceptedVariants(header: string | null): CompressedVariant[] {
  const tokens = parseAcceptEncoding(header);
  return COMPRESSED_VARIANTS.filter(variant => tokens.has(variant.encoding));
}

export function variantKey(key: string, variant: CompressedVariant): string {
  return key + variant.suffix;
}
