/**
 * Request Routing
 * Main export file for routing and failure classification
 */

export * from './routing.types';
export * from './failure.classifier';
export * from './request.router';
