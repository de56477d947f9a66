import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Overlay router (local i2pd daemon)
  OVERLAY_CONFIG_DIR: process.env.OVERLAY_CONFIG_DIR || '.',
  OVERLAY_ROUTER_BINARY: process.env.OVERLAY_ROUTER_BINARY || 'i2pd',
  OVERLAY_HTTP_PROXY_PORT: parseInt(process.env.OVERLAY_HTTP_PROXY_PORT || '4444', 10),
  OVERLAY_HTTPS_PROXY_PORT: parseInt(process.env.OVERLAY_HTTPS_PROXY_PORT || '4447', 10),
  OVERLAY_HTTP_PROXY_URL: process.env.OVERLAY_HTTP_PROXY_URL || 'http://127.0.0.1:4444',
  OVERLAY_HTTPS_PROXY_URL: process.env.OVERLAY_HTTPS_PROXY_URL || 'http://127.0.0.1:4447',
  OVERLAY_ATTACHED: process.env.OVERLAY_ATTACHED === 'true', // Default false: supervise our own daemon

  // Discovery
  DIRECTORY_URL: process.env.DIRECTORY_URL || 'http://outproxys.i2p/',
  DISCOVERY_TIMEOUT: parseInt(process.env.DISCOVERY_TIMEOUT || '30000', 10), // 30 seconds

  // Benchmark
  BENCHMARK_URL: process.env.BENCHMARK_URL || 'http://httpbin.org/bytes/10240', // 10KB reference payload
  PROBE_TIMEOUT: parseInt(process.env.PROBE_TIMEOUT || '10000', 10), // 10 seconds
  BENCHMARK_MAX_CONCURRENCY: parseInt(process.env.BENCHMARK_MAX_CONCURRENCY || '10', 10),
  OVERLAY_PLACEHOLDER_THROUGHPUT: parseFloat(process.env.OVERLAY_PLACEHOLDER_THROUGHPUT || '51200'), // 50 KB/s
  OVERLAY_PLACEHOLDER_LATENCY: parseFloat(process.env.OVERLAY_PLACEHOLDER_LATENCY || '200'), // ms

  // Selection
  RETEST_INTERVAL: parseInt(process.env.RETEST_INTERVAL || '300000', 10), // 5 minutes

  // Routing
  ROUTE_TIMEOUT: parseInt(process.env.ROUTE_TIMEOUT || '60000', 10), // 60 seconds, must exceed PROBE_TIMEOUT
  ROUTE_CANDIDATE_COUNT: parseInt(process.env.ROUTE_CANDIDATE_COUNT || '5', 10),
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (Windows NT 10.0; rv:128.0) Gecko/20100101 Firefox/128.0',

  // Parallel download
  DOWNLOAD_CHUNKS: parseInt(process.env.DOWNLOAD_CHUNKS || '4', 10),

  // Circuit Breaker (directory fetch)
  CIRCUIT_BREAKER_ENABLED: process.env.CIRCUIT_BREAKER_ENABLED !== 'false', // Default true
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '60000', 10), // 1 minute
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '3', 10),
} as const;

export default env;
