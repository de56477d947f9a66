/**
 * Benchmark Types
 */

export interface BenchmarkConfig {
  testUrl?: string;               // reference payload endpoint
  timeoutMs?: number;             // per request of a probe
  maxConcurrency?: number;
  overlayThroughput?: number;     // placeholder for overlay-hosted proxies (bytes/s)
  overlayLatencyMs?: number;
  now?: () => number;             // monotonic clock in ms
}

export interface BenchmarkSummary {
  total: number;
  successful: number;
  failed: number;
  fastest?: { url: string; throughput: number };
}
