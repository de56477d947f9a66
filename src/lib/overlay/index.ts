/**
 * Overlay Router
 * Main export file for the local I2P router adapter
 */

export * from './overlay.types';
export * from './overlay.router';
export * from './daemon.binding';
export * from './attached.binding';
