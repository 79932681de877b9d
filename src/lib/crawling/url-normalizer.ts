/**
 * URL Normalization Utilities
 * Functions for normalizing and validating crawl URLs
 */

/**
 * Normalize a URL by removing fragments, sorting query params, etc.
 * Returns null for anything that is not an absolute http(s) URL after resolution.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(url.trim(), baseUrl) : new URL(url.trim());
  } catch {
    return null;
  }

  if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
    return null;
  }

  // Remove fragment
  urlObj.hash = '';

  // Sort query parameters
  const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
    a.localeCompare(b)
  );
  urlObj.search = '';
  sortedParams.forEach(([key, value]) => {
    urlObj.searchParams.append(key, value);
  });

  // Remove trailing slash (except for root)
  const pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    urlObj.pathname = pathname.slice(0, -1);
  }

  // Normalize hostname (lowercase)
  urlObj.hostname = urlObj.hostname.toLowerCase();

  return urlObj.href;
}

/**
 * Extract the lowercase host name of a URL ('' when unparseable)
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Check a URL's host against an allow list (exact host or subdomain).
 * An empty allow list admits every host.
 */
export function isAllowedHost(url: string, allowedHosts: readonly string[]): boolean {
  if (allowedHosts.length === 0) {
    return true;
  }
  const host = extractHost(url);
  if (!host) {
    return false;
  }
  return allowedHosts.some((allowed) => {
    const normalized = allowed.toLowerCase();
    return host === normalized || host.endsWith(`.${normalized}`);
  });
}

/**
 * Validate URL format (absolute http or https)
 */
export function isValidUrl(url: string): boolean {
  return normalizeUrl(url) !== null;
}

/**
 * Resolve relative URL to absolute
 */
export function resolveUrl(url: string, baseUrl: string): string | null {
  try {
    return new URL(url, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Path of a URL without query or fragment ('' when unparseable)
 */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return '';
  }
}
