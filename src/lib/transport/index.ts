/**
 * HTTP Transport
 * Main export file for proxied HTTP transport
 */

export * from './transport.types';
export * from './proxy.dialer';
export * from './axios.transport';
