export * from './circuit-breaker.types';
export * from './circuit-breaker.manager';
