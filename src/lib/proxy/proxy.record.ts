/**
 * Proxy Record
 * Construction, identity and overlay-domain helpers for ProxyRecord
 */

import { ProxyKind, ProxyRecord } from './proxy.types';

const OVERLAY_SUFFIX = '.i2p';

const SOCKS_LABELS = new Set(['socks', 'socks4', 'socks4a', 'socks5', 'socks5h']);
const ENCRYPTED_PORTS = new Set([443, 8443]);
const SOCKS_PORTS = new Set([1080, 9050]);

const SCHEME_BY_KIND: Record<ProxyKind, string> = {
  [ProxyKind.PLAIN]: 'http',
  [ProxyKind.ENCRYPTED]: 'https',
  [ProxyKind.SOCKS_LIKE]: 'socks5',
};

/**
 * Check whether a host belongs to the overlay namespace (*.i2p, *.b32.i2p)
 */
export function isOverlayDomain(host: string): boolean {
  const normalized = host.trim().toLowerCase().replace(/\.$/, '');
  return normalized.length > OVERLAY_SUFFIX.length && normalized.endsWith(OVERLAY_SUFFIX);
}

/**
 * Check whether a URL targets an overlay host
 */
export function isOverlayUrl(url: string): boolean {
  try {
    return isOverlayDomain(new URL(url).hostname);
  } catch {
    return false;
  }
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * Map a scheme or directory type label to a kind.
 * Returns null for labels that name no known proxy protocol.
 */
export function kindFromLabel(label: string): ProxyKind | null {
  const normalized = label.trim().toLowerCase().replace(/:$/, '');
  if (normalized === 'http') return ProxyKind.PLAIN;
  if (normalized === 'https') return ProxyKind.ENCRYPTED;
  if (SOCKS_LABELS.has(normalized)) return ProxyKind.SOCKS_LIKE;
  return null;
}

export function kindFromPort(port: number): ProxyKind {
  if (ENCRYPTED_PORTS.has(port)) return ProxyKind.ENCRYPTED;
  if (SOCKS_PORTS.has(port)) return ProxyKind.SOCKS_LIKE;
  return ProxyKind.PLAIN;
}

/**
 * Build a frozen record. The scheme label wins over the port when both are known.
 */
export function createProxyRecord(host: string, port: number, scheme?: string): ProxyRecord {
  const normalizedHost = host.trim().toLowerCase();
  if (!normalizedHost) {
    throw new Error('Proxy host must not be empty');
  }
  if (!isValidPort(port)) {
    throw new Error(`Invalid proxy port ${port} for ${normalizedHost}`);
  }

  const kind = (scheme ? kindFromLabel(scheme) : null) ?? kindFromPort(port);

  return Object.freeze({
    host: normalizedHost,
    port,
    kind,
    url: `${SCHEME_BY_KIND[kind]}://${normalizedHost}:${port}`,
  });
}

/**
 * Parse a proxy URL (http://, https://, socks5://...) into a record
 */
export function parseProxyUrl(url: string): ProxyRecord | null {
  try {
    const parsed = new URL(url);
    const scheme = parsed.protocol.replace(':', '');
    if (!kindFromLabel(scheme)) {
      console.warn(`Unsupported proxy scheme in ${url}`);
      return null;
    }
    const defaultPort = scheme === 'https' ? 443 : scheme === 'http' ? 80 : 1080;
    const port = parsed.port ? parseInt(parsed.port, 10) : defaultPort;
    return createProxyRecord(parsed.hostname, port, scheme);
  } catch (error) {
    console.warn(`Failed to parse proxy URL ${url}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

export function proxyKey(record: Pick<ProxyRecord, 'host' | 'port'>): string {
  return `${record.host}:${record.port}`;
}

export function sameProxy(a: Pick<ProxyRecord, 'host' | 'port'>, b: Pick<ProxyRecord, 'host' | 'port'>): boolean {
  return proxyKey(a) === proxyKey(b);
}

/**
 * Drop repeated host:port entries, keeping the first occurrence and its position
 */
export function dedupeRecords(records: readonly ProxyRecord[]): ProxyRecord[] {
  const seen = new Set<string>();
  const unique: ProxyRecord[] = [];
  for (const record of records) {
    const key = proxyKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}
