/**
 * Digest extraction from `container image inspect` and `container inspect`
 * output, used by `update` to decide whether the running container is
 * already on the freshly pulled image.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstEntry(inspected: unknown): Record<string, unknown> | undefined {
  if (!Array.isArray(inspected)) return undefined;
  const [first]: unknown[] = inspected;
  return isRecord(first) ? first : undefined;
}

function stringField(record: Record<string, unknown> | undefined, key: string): string {
  const value = record?.[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Digest of a local image: `variants[0].digest` when present (multi-arch
 * index), otherwise the top-level `digest`. Empty string when neither is set.
 */
export function imageDigest(inspected: unknown): string {
  const entry = firstEntry(inspected);
  const variants = entry?.['variants'];
  if (Array.isArray(variants) && variants.length > 0) {
    const [variant]: unknown[] = variants;
    if (isRecord(variant) && typeof variant['digest'] === 'string') {
      return variant['digest'];
    }
  }
  return stringField(entry, 'digest');
}

/** Digest of the image a container was created from (`image.digest`), or `''`. */
export function containerImageDigest(inspected: unknown): string {
  const image = firstEntry(inspected)?.['image'];
  return isRecord(image) ? stringField(image, 'digest') : '';
}

/** True only when both digests are known and identical. */
export function isUpToDate(current: string, remote: string): boolean {
  return current !== '' && remote !== '' && current === remote;
}
