export * from './tunnel.types';
export * from './tunnel.service';
