export function haveSameOrigin(firstUrl: string, secondUrl: string): boolean {
  try {
    return new URL(firstUrl).origin === new URL(secondUrl).origin;
  } catch { return false; }
}

export function isHttpOrHttpsUrl(candidateUrl: string): boolean {
  try {
    const parsedUrl = new URL(candidateUrl);
    return parsedUrl.protocol === 'http:' || parsedUrl.protocol === 'https:';
  } catch { return false; }
}

/** Resolves `href` against `baseUrl`; undefined for empty, script or mail links and unparseable input. */
export function resolveHref(href: string | undefined, baseUrl: string): string | undefined {
  const trimmedHref = href?.trim();
  if (!trimmedHref) return undefined;
  if (/^(javascript|mailto|tel):/i.test(trimmedHref)) return undefined;
  try {
    return new URL(trimmedHref, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/** Drops the fragment and tracking parameters, lowercases the host, sorts the query and strips trailing slashes. */
export function canonicalizeUrl(input: string): string {
  const parsedUrl = new URL(input);

  parsedUrl.hostname = parsedUrl.hostname.toLowerCase();

  parsedUrl.hash = '';

  const filteredQueryParams = new URLSearchParams();
  const sortedParams = Array.from(parsedUrl.searchParams.entries())
    .filter(([key]) => !/^utm_|^gclid$|^fbclid$/i.test(key));

  sortedParams.sort(([firstKey], [secondKey]) => firstKey.localeCompare(secondKey));

  for (const [key, value] of sortedParams) filteredQueryParams.append(key, value);

  parsedUrl.search = filteredQueryParams.toString() ? `?${filteredQueryParams.toString()}` : '';

  if (parsedUrl.pathname !== '/' && parsedUrl.pathname.endsWith('/')) {
    parsedUrl.pathname = parsedUrl.pathname.replace(/\/+$/, '');
  }

  return parsedUrl.toString();
}
