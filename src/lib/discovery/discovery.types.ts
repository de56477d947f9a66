/**
 * Discovery Types
 */

import { CircuitBreakerConfig } from '../circuit-breaker/circuit-breaker.types';
import { ProxyRecord } from '../proxy/proxy.types';
import { OverlayIngress } from '../transport/proxy.dialer';

export interface DiscoveryConfig {
  directoryUrl?: string;
  timeoutMs?: number;
  ingress?: OverlayIngress;               // local forward proxy used to reach the directory
  circuitBreaker?: CircuitBreakerConfig;
}

/**
 * Anything that can supply candidate records
 */
export interface ProxySource {
  discover(): Promise<ProxyRecord[]>;
}
