/**
 * Joins an origin base URL with an incoming request URL (path + query),
 * the way a single-host reverse proxy does:
 *
 * - exactly one slash between the base path and the request path;
 * - base query and request query are concatenated with `&`.
 */
export function buildUpstreamUrl(base: URL, requestUrl: string): string {
  const queryStart = requestUrl.indexOf('?');
  const requestPath = queryStart === -1 ? requestUrl : requestUrl.slice(0, queryStart);
  const requestQuery = queryStart === -1 ? '' : requestUrl.slice(queryStart + 1);

  const path = joinSlash(base.pathname, requestPath);

  const baseQuery = base.search.startsWith('?') ? base.search.slice(1) : base.search;
  const query = baseQuery === '' || requestQuery === ''
    ? baseQuery + requestQuery
    : `${baseQuery}&${requestQuery}`;

  return `${base.origin}${path}${query === '' ? '' : `?${query}`}`;
}

function joinSlash(a: string, b: string): string {
  const aSlash = a.endsWith('/');
  const bSlash = b.startsWith('/');
  if (aSlash && bSlash) return a + b.slice(1);
  if (!aSlash && !bSlash) return `${a}/${b}`;
  return a + b;
}
