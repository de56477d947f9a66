/**
 * Transport Types
 * Contract between the proxy pipeline and the HTTP client
 */

import type { Readable } from 'stream';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * Agent family used to reach the proxy
 */
export type DialScheme = 'http' | 'https' | 'socks5';

export interface DialRoute {
  scheme: DialScheme;
  proxyUrl: string;
}

export interface OutboundRequest {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: Buffer | string;
  stream?: boolean;          // deliver the body through `stream` instead of `body`
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;              // empty when streaming
  stream: Readable | null;
}

export interface HttpTransport {
  send(request: OutboundRequest, route: DialRoute): Promise<TransportResponse>;
}
