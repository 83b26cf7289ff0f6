// Query parameters that only track the visit; pages differing in these are the same page.
const TRACKING_PARAM = /^(utm_[a-z]+|fbclid|gclid|mc_eid)$/i;

function parseHttpUrl(raw: string, base?: URL | string): URL | null {
  if (!URL.canParse(raw, base)) {
    return null;
  }
  const url = new URL(raw, base);
  return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
}

export function isHttpUrl(raw: string): boolean {
  return parseHttpUrl(raw) !== null;
}

/**
 * Resolves `raw` against `base` into the canonical form used to key pages:
 * no fragment, no tracking parameters, no trailing slash outside the root.
 * WHATWG parsing already lowercases the scheme and host and drops default
 * ports. Returns null for anything that is not http(s).
 */
export function normalizeUrl(raw: string, base?: URL | string): string | null {
  const url = parseHttpUrl(raw, base);
  if (!url) {
    return null;
  }

  url.hash = '';
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAM.test(key)) {
      url.searchParams.delete(key);
    }
  }
  if (url.pathname !== '/') {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }

  return url.toString();
}

export function sameHost(a: string | URL, b: string | URL): boolean {
  const left = typeof a === 'string' ? parseHttpUrl(a) : a;
  const right = typeof b === 'string' ? parseHttpUrl(b) : b;
  return left !== null && right !== null && left.hostname === right.hostname;
}
