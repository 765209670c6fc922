/**
 * Outbound proxy selection for browser sessions.
 *
 * A rotation is built once from config and injected into the session factory;
 * there is no process-wide instance.
 */

export type ProxyStrategy = 'round_robin' | 'random' | 'sticky';

/** Shape accepted by playwright's `launch({ proxy })`. */
export interface ProxySettings {
  server: string;
  username?: string;
  password?: string;
}

export interface ProxyRotation {
  readonly size: number;
  /** Next proxy URL, or null when none are configured */
  next(): string | null;
}

const SUPPORTED_SCHEMES = new Set(['http:', 'https:', 'socks5:']);

function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Paid proxy endpoints need a supported scheme, a host, credentials and an
 * explicit port (plain http may fall back to its default).
 */
export function isValidProxyUrl(value: string): boolean {
  const url = tryParseUrl(value);
  if (!url || !SUPPORTED_SCHEMES.has(url.protocol)) return false;
  if (!url.hostname) return false;
  if (!url.port && url.protocol !== 'http:') return false;
  return url.username.length > 0 && url.password.length > 0;
}

export function parseProxyUrl(value: string): ProxySettings | null {
  const url = tryParseUrl(value);
  if (!url || !SUPPORTED_SCHEMES.has(url.protocol) || !url.hostname) return null;

  const settings: ProxySettings = {
    server: `${url.protocol}//${url.hostname}${url.port ? `:${url.port}` : ''}`,
  };
  if (url.username) settings.username = decodeURIComponent(url.username);
  if (url.password) settings.password = decodeURIComponent(url.password);
  return settings;
}

export function createProxyRotation(
  strategy: ProxyStrategy,
  urls: readonly string[],
  random: () => number = Math.random,
): ProxyRotation {
  const proxies = [...urls];
  let cursor = 0;

  return {
    size: proxies.length,
    next() {
      if (proxies.length === 0) return null;

      switch (strategy) {
        case 'random':
          return proxies[Math.floor(random() * proxies.length)] ?? null;
        case 'round_robin': {
          const proxy = proxies[cursor] ?? null;
          cursor = (cursor + 1) % proxies.length;
          return proxy;
        }
        case 'sticky':
          return proxies[0] ?? null;
      }
    },
  };
}
