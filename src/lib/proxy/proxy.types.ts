/**
 * Proxy Types
 * Type definitions shared by discovery, benchmark, selection and routing
 */

/**
 * Proxy protocol kind, derived from the advertised scheme or port
 */
export enum ProxyKind {
  PLAIN = 'plain',           // HTTP forward proxy
  ENCRYPTED = 'encrypted',   // HTTPS / CONNECT tunnelling proxy
  SOCKS_LIKE = 'socks_like', // SOCKS proxy, HTTPS fallback when SOCKS is unavailable
}

/**
 * Discovered proxy. Frozen at construction; identity is host:port.
 */
export interface ProxyRecord {
  readonly host: string;
  readonly port: number;
  readonly kind: ProxyKind;
  readonly url: string;
}

/**
 * Outcome of one benchmark probe
 */
export interface BenchmarkResult {
  readonly record: ProxyRecord;
  readonly success: boolean;
  readonly throughput: number;   // bytes/sec, 0 on failure
  readonly latencyMs: number;
  readonly error?: string;
}

/**
 * Proxy chosen by the selector, ranked by throughput
 */
export interface RankedCandidate {
  readonly record: ProxyRecord;
  readonly throughput: number;
  readonly selectedAt: number;   // epoch ms
}
