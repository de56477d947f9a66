/**
 * Proxy Records
 * Main export file for proxy record types and helpers
 */

export * from './proxy.types';
export * from './proxy.record';
