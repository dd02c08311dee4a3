/**
 * URL detection and canonicalization. Canonical URLs are the identity of
 * URL resources, so two spellings of one page resolve to one item.
 */

export function isUrl(value: string): boolean {
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) return false;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Lower-cases scheme and host (via WHATWG parsing), drops the fragment and
 * default ports, and removes a trailing slash from non-root paths.
 */
export function canonicalizeUrl(value: string): string {
  const url = new URL(value.trim());
  url.hash = "";
  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "");
  }
  return url.toString();
}
