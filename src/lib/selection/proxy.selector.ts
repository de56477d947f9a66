/**
 * Proxy Selector
 * Ranks benchmarked proxies by throughput and owns the selection cache
 */

import { ProxySource } from '../discovery/discovery.types';
import { BenchmarkResult, ProxyRecord, RankedCandidate } from '../proxy/proxy.types';
import { sameProxy } from '../proxy/proxy.record';
import { describeError } from '../routing/failure.classifier';
import { env } from '../../config/env';
import { ProxyProber, SelectorConfig, SelectorStats } from './selection.types';

function kbps(throughput: number): string {
  return (throughput / 1024).toFixed(2);
}

function clampCount(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

/**
 * Successful results, fastest first. Array.prototype.sort is stable, so ties keep input order.
 */
export function rankResults(results: readonly BenchmarkResult[]): BenchmarkResult[] {
  return results.filter((r) => r.success).sort((a, b) => b.throughput - a.throughput);
}

/**
 * Single writer for the cached best candidate and ranked list. Reads are synchronous;
 * refreshes are serialized so concurrent callers share one benchmark run.
 */
export class ProxySelector {
  private readonly prober: ProxyProber;
  private readonly discovery: ProxySource | null;
  private readonly retestIntervalMs: number;
  private readonly maxConcurrency: number;
  private readonly clock: () => number;

  private best: RankedCandidate | null = null;
  private ranked: RankedCandidate[] = [];
  private lastRunAt: number | null = null;
  private refreshCount = 0;
  private refreshing: Promise<void> | null = null;

  constructor(prober: ProxyProber, discovery: ProxySource | null = null, config?: SelectorConfig) {
    this.prober = prober;
    this.discovery = discovery;
    this.retestIntervalMs = config?.retestIntervalMs ?? env.RETEST_INTERVAL;
    this.maxConcurrency = config?.maxConcurrency ?? env.BENCHMARK_MAX_CONCURRENCY;
    this.clock = config?.clock ?? Date.now;

    console.log(`Initializing ProxySelector with retest interval: ${this.retestIntervalMs / 1000}s`);
  }

  /**
   * Fastest successful result, cached as the best candidate
   */
  selectBest(results: readonly BenchmarkResult[]): RankedCandidate | null {
    let fastest: BenchmarkResult | null = null;
    for (const result of results) {
      if (result.success && (fastest === null || result.throughput > fastest.throughput)) {
        fastest = result;
      }
    }

    if (!fastest) {
      console.warn('No successful proxy tests found');
      this.best = null;
      return null;
    }

    this.best = this.toCandidate(fastest);
    console.log(`Selected fastest proxy: ${this.best.record.url} (${kbps(this.best.throughput)} KB/s)`);
    return this.best;
  }

  /**
   * Top `n` successful results by throughput. The list becomes the ranked cache and its head the best.
   */
  selectTopN(results: readonly BenchmarkResult[], n: number): RankedCandidate[] {
    const top = rankResults(results)
      .slice(0, clampCount(n))
      .map((result) => this.toCandidate(result));

    this.ranked = top;
    this.best = top[0] ?? null;

    if (top.length === 0) {
      console.warn('No successful proxy tests found');
    } else {
      console.log(`Selected top ${top.length} proxies, fastest: ${top[0].record.url} (${kbps(top[0].throughput)} KB/s)`);
    }
    return [...top];
  }

  getCached(): RankedCandidate | null {
    return this.best;
  }

  /**
   * Best candidate, re-benchmarking when the last run is older than the retest interval
   * or nothing is cached
   */
  async ensureFresh(records?: readonly ProxyRecord[]): Promise<RankedCandidate | null> {
    if (!this.isStale() && this.best) {
      return this.best;
    }

    await this.refresh(records);
    return this.best;
  }

  /**
   * Up to `n` ranked candidates. A fresh, non-empty ranked list is served from the cache.
   */
  async ensureFreshN(records: readonly ProxyRecord[] | undefined, n: number): Promise<RankedCandidate[]> {
    if (!this.isStale() && this.ranked.length > 0) {
      return this.ranked.slice(0, clampCount(n));
    }

    await this.refresh(records);
    return this.ranked.slice(0, clampCount(n));
  }

  /**
   * Evict a failing proxy. Clears the best only when it is the same host:port.
   */
  reportFailure(record: Pick<ProxyRecord, 'host' | 'port'>): void {
    if (this.best && sameProxy(this.best.record, record)) {
      console.warn(`Clearing cached proxy ${this.best.record.url} after failure`);
      this.best = null;
    }
    this.ranked = this.ranked.filter((candidate) => !sameProxy(candidate.record, record));
  }

  isStale(): boolean {
    return this.lastRunAt === null || this.clock() - this.lastRunAt >= this.retestIntervalMs;
  }

  getStats(): SelectorStats {
    return {
      best: this.best,
      rankedCount: this.ranked.length,
      lastRunAt: this.lastRunAt,
      refreshCount: this.refreshCount,
      retestIntervalMs: this.retestIntervalMs,
      refreshing: this.refreshing !== null,
    };
  }

  private refresh(records?: readonly ProxyRecord[]): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.runRefresh(records).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async runRefresh(records?: readonly ProxyRecord[]): Promise<void> {
    const candidates = records && records.length > 0 ? records : await this.discoverRecords();

    console.log(`Benchmarking ${candidates.length} proxies`);
    this.lastRunAt = this.clock();
    const results = await this.prober.probeMany(candidates, this.maxConcurrency);
    this.refreshCount++;

    this.selectTopN(results, results.length);
  }

  private async discoverRecords(): Promise<ProxyRecord[]> {
    if (!this.discovery) {
      return [];
    }

    try {
      return await this.discovery.discover();
    } catch (error) {
      console.error(`Proxy discovery failed: ${describeError(error)}`);
      return [];
    }
  }

  private toCandidate(result: BenchmarkResult): RankedCandidate {
    return Object.freeze({
      record: result.record,
      throughput: result.throughput,
      selectedAt: this.clock(),
    });
  }
}
