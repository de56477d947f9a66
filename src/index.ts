/**
 * I2P Outproxy Router
 * Public API: discovery, benchmarking, selection and routed requests over I2P outproxies
 */

export * from './lib/proxy';
export * from './lib/errors';
export * from './lib/circuit-breaker';
export * from './lib/concurrency';
export * from './lib/transport';
export * from './lib/overlay';
export * from './lib/discovery';
export * from './lib/benchmark';
export * from './lib/selection';
export * from './lib/routing';
export * from './lib/download';
export * from './modules/tunnel';
export { env } from './config/env';
