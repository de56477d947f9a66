/**
 * Proxy Benchmark
 * Main export file for proxy benchmarking
 */

export * from './benchmark.types';
export * from './proxy.benchmark';
