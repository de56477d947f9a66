/**
 * Proxy Discovery
 * Main export file for outproxy directory discovery
 */

export * from './discovery.types';
export * from './directory.parser';
export * from './proxy.discovery';
