export * from './worker.pool';
