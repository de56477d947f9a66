/**
 * Routing Types
 */

import type { Readable } from 'stream';
import { ProxyRecord } from '../proxy/proxy.types';
import { HttpMethod } from '../transport/transport.types';
import { OverlayIngress } from '../transport/proxy.dialer';

export interface RouteRequest {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: Buffer | string;
  stream?: boolean;
  timeoutMs?: number;
}

export interface RoutedResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;                  // empty when streaming
  bodyStream: Readable | null;
  proxyUsed: string;             // outproxy URL or the local overlay ingress
  attempts: number;
}

export interface RouterConfig {
  candidateCount?: number;
  timeoutMs?: number;
  ingress?: OverlayIngress;
}

/**
 * Anything that can route a request (the router, or a test double)
 */
export interface RequestExecutor {
  route(request: RouteRequest, discoveredRecords?: readonly ProxyRecord[]): Promise<RoutedResponse>;
}
