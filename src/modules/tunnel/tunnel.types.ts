/**
 * Tunnel Types
 */

import { OverlayRouterBinding, OverlayRouterStatus } from '../../lib/overlay/overlay.types';
import { ProxyRecord } from '../../lib/proxy/proxy.types';
import { SelectorStats } from '../../lib/selection/selection.types';
import { HttpTransport } from '../../lib/transport/transport.types';
import { CircuitBreakerStats } from '../../lib/circuit-breaker/circuit-breaker.types';

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: Buffer | string;
  stream?: boolean;
  timeoutMs?: number;
}

export interface TunnelServiceConfig {
  transport?: HttpTransport;
  binding?: OverlayRouterBinding;
  configDir?: string;
  directoryUrl?: string;
  benchmarkUrl?: string;
  retestIntervalMs?: number;
  candidateCount?: number;
  downloadChunks?: number;
  clock?: () => number;
}

export interface TunnelStatus {
  overlay: OverlayRouterStatus;
  selector: SelectorStats;
  directory: CircuitBreakerStats;
  knownProxies: ProxyRecord[];
  discoveredAt: number | null;
}
