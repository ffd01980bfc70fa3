/** Hostname that reaches the host machine from inside a container. */
export const DOCKER_HOST_ALIAS = "host.docker.internal";

const LOCALHOST_TOKEN = /localhost/i;

/**
 * Trim whitespace and trailing slashes from a base URL.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, "");
}

/**
 * Compute the ordered base URLs to try for a request.
 *
 * The first entry is always the normalized input. When its hostname contains
 * `localhost`, a second entry swaps that token for {@link DOCKER_HOST_ALIAS}
 * and keeps everything else (scheme, port, path, query, fragment).
 *
 * @example
 * ```ts
 * resolveBaseCandidates("http://localhost:8000/");
 * // ["http://localhost:8000", "http://host.docker.internal:8000"]
 * ```
 */
export function resolveBaseCandidates(baseUrl: string): string[] {
  const primary = normalizeBaseUrl(baseUrl);
  const parsed = parseUrl(primary);

  if (!parsed || !LOCALHOST_TOKEN.test(parsed.hostname)) {
    return [primary];
  }

  parsed.hostname = parsed.hostname.replace(LOCALHOST_TOKEN, DOCKER_HOST_ALIAS);
  const fallback = normalizeBaseUrl(parsed.toString());

  return fallback === primary ? [primary] : [primary, fallback];
}

function parseUrl(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

/**
 * `host[:port]` of a URL, or the input itself when it does not parse.
 */
export function describeHost(value: string): string {
  return parseUrl(value)?.host ?? value;
}
