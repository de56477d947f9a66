export * from './tunnel.errors';
