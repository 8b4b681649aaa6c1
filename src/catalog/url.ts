/**
 * Canonical form of a library URL for catalog keys.
 *
 * Lowercases, strips an `http://` or `https://` scheme and one trailing `/`,
 * so `https://GitHub.com/spf13/cobra/` and `github.com/spf13/cobra` match.
 */
export function normalizeUrl(url: string): string {
  let normalized = url.toLowerCase();
  for (const scheme of ['https://', 'http://']) {
    if (normalized.startsWith(scheme)) {
      normalized = normalized.slice(scheme.length);
      break;
    }
  }
  return normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

/**
 * Whether a URL given on the command line is absolute http(s).
 */
export function isValidUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}
