/**
 * Proxy Selection
 * Main export file for proxy ranking and the selection cache
 */

export * from './selection.types';
export * from './proxy.selector';
