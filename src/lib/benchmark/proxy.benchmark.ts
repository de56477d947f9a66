/**
 * Proxy Benchmark
 * Measures latency and throughput of outproxies against a reference payload
 */

import { runPool, poolSize } from '../concurrency/worker.pool';
import { BenchmarkResult, ProxyRecord } from '../proxy/proxy.types';
import { isOverlayDomain } from '../proxy/proxy.record';
import { describeError } from '../routing/failure.classifier';
import { sendThroughProxy } from '../transport/proxy.dialer';
import { HttpTransport, OutboundRequest } from '../transport/transport.types';
import { env } from '../../config/env';
import { BenchmarkConfig, BenchmarkSummary } from './benchmark.types';

function kbps(throughput: number): string {
  return (throughput / 1024).toFixed(2);
}

export function summarizeResults(results: readonly BenchmarkResult[]): BenchmarkSummary {
  const successes = results.filter((r) => r.success);
  const fastest = successes.reduce<BenchmarkResult | undefined>(
    (best, r) => (best === undefined || r.throughput > best.throughput ? r : best),
    undefined
  );

  return {
    total: results.length,
    successful: successes.length,
    failed: results.length - successes.length,
    fastest: fastest ? { url: fastest.record.url, throughput: fastest.throughput } : undefined,
  };
}

export class ProxyBenchmark {
  private readonly transport: HttpTransport;
  private readonly config: Required<BenchmarkConfig>;

  constructor(transport: HttpTransport, config?: BenchmarkConfig) {
    this.transport = transport;
    this.config = {
      testUrl: config?.testUrl ?? env.BENCHMARK_URL,
      timeoutMs: config?.timeoutMs ?? env.PROBE_TIMEOUT,
      maxConcurrency: config?.maxConcurrency ?? env.BENCHMARK_MAX_CONCURRENCY,
      overlayThroughput: config?.overlayThroughput ?? env.OVERLAY_PLACEHOLDER_THROUGHPUT,
      overlayLatencyMs: config?.overlayLatencyMs ?? env.OVERLAY_PLACEHOLDER_LATENCY,
      now: config?.now ?? (() => performance.now()),
    };
  }

  /**
   * Probe one proxy. Never throws; failures come back as unsuccessful results.
   */
  async probe(record: ProxyRecord): Promise<BenchmarkResult> {
    // Overlay hosts only resolve inside the overlay, so they cannot be dialed from here
    if (isOverlayDomain(record.host)) {
      console.log(`Skipping probe for overlay-hosted proxy ${record.url}`);
      return this.succeeded(record, this.config.overlayThroughput, this.config.overlayLatencyMs);
    }

    const latencyMs = await this.measureLatency(record);

    const downloadStart = this.config.now();
    let body: Buffer;
    try {
      const { response } = await sendThroughProxy(this.transport, this.request('GET'), record);
      if (response.status < 200 || response.status >= 300) {
        return this.failed(record, `HTTP error: ${response.status}`);
      }
      body = response.body;
    } catch (error) {
      return this.failed(record, `Request failed: ${describeError(error)}`);
    }
    const elapsedMs = this.config.now() - downloadStart;

    if (elapsedMs <= 0) {
      return this.failed(record, 'Download time was zero');
    }

    const throughput = (body.length * 1000) / elapsedMs;
    console.log(`Proxy ${record.url}: ${kbps(throughput)} KB/s, ${latencyMs.toFixed(2)} ms latency`);
    return this.succeeded(record, throughput, latencyMs);
  }

  /**
   * Probe many proxies with bounded concurrency. Results arrive in completion order.
   */
  async probeMany(records: readonly ProxyRecord[], maxConcurrency?: number): Promise<BenchmarkResult[]> {
    if (records.length === 0) {
      return [];
    }

    const concurrency = poolSize(records.length, maxConcurrency ?? this.config.maxConcurrency);
    console.log(`Testing ${records.length} proxies in parallel (max ${concurrency} concurrent)`);

    const results = await runPool(records, concurrency, (record) => this.probe(record));

    const summary = summarizeResults(results);
    console.log(`Proxy testing completed: ${summary.successful} successful, ${summary.failed} failed`);
    if (summary.fastest) {
      console.log(`Fastest proxy: ${summary.fastest.url} (${kbps(summary.fastest.throughput)} KB/s)`);
    }

    return results;
  }

  /**
   * Wall time of a HEAD to the reference endpoint. Its outcome does not decide the probe.
   */
  private async measureLatency(record: ProxyRecord): Promise<number> {
    const start = this.config.now();
    try {
      await sendThroughProxy(this.transport, this.request('HEAD'), record);
    } catch (error) {
      console.warn(`Latency check failed for ${record.url}: ${describeError(error)}`);
    }
    return this.config.now() - start;
  }

  private request(method: 'HEAD' | 'GET'): OutboundRequest {
    return { url: this.config.testUrl, method, timeoutMs: this.config.timeoutMs };
  }

  private succeeded(record: ProxyRecord, throughput: number, latencyMs: number): BenchmarkResult {
    return Object.freeze({ record, success: true, throughput, latencyMs });
  }

  private failed(record: ProxyRecord, error: string): BenchmarkResult {
    console.warn(`Proxy test failed for ${record.url}: ${error}`);
    return Object.freeze({ record, success: false, throughput: 0, latencyMs: 0, error });
  }
}
