/**
 * Selection Types
 */

import { BenchmarkResult, ProxyRecord, RankedCandidate } from '../proxy/proxy.types';

export interface SelectorConfig {
  retestIntervalMs?: number;
  maxConcurrency?: number;
  clock?: () => number;        // epoch ms
}

/**
 * The part of the benchmark the selector drives
 */
export interface ProxyProber {
  probeMany(records: readonly ProxyRecord[], maxConcurrency?: number): Promise<BenchmarkResult[]>;
}

export interface SelectorStats {
  best: RankedCandidate | null;
  rankedCount: number;
  lastRunAt: number | null;
  refreshCount: number;
  retestIntervalMs: number;
  refreshing: boolean;
}
