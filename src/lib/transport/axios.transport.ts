/**
 * Axios Transport
 * HttpTransport backed by axios and proxy agents (HTTP, HTTPS CONNECT, SOCKS5)
 */

import type { Agent } from 'http';
import type { Readable } from 'stream';
import axios, { AxiosRequestConfig } from 'axios';
import { HttpProxyAgent } from 'http-proxy-agent';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { env } from '../../config/env';
import { DialRoute, HttpTransport, OutboundRequest, TransportResponse } from './transport.types';

const MAX_REDIRECTS = 5;

interface RouteAgents {
  httpAgent: Agent;
  httpsAgent: Agent;
}

export function createAgents(route: DialRoute): RouteAgents {
  switch (route.scheme) {
    case 'socks5': {
      const agent = new SocksProxyAgent(route.proxyUrl);
      return { httpAgent: agent, httpsAgent: agent };
    }
    case 'https': {
      const agent = new HttpsProxyAgent(route.proxyUrl);
      return { httpAgent: agent, httpsAgent: agent };
    }
    case 'http':
    default:
      return {
        httpAgent: new HttpProxyAgent(route.proxyUrl),
        httpsAgent: new HttpsProxyAgent(route.proxyUrl),
      };
  }
}

/**
 * Flatten response headers to lower-cased single strings
 */
export function normalizeHeaders(raw: object): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const key of Object.keys(raw)) {
    const value: unknown = Reflect.get(raw, key);
    if (value === undefined || value === null) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return headers;
}

export class AxiosTransport implements HttpTransport {
  private readonly userAgent: string;

  constructor(userAgent: string = env.USER_AGENT) {
    this.userAgent = userAgent;
  }

  async send(request: OutboundRequest, route: DialRoute): Promise<TransportResponse> {
    const { httpAgent, httpsAgent } = createAgents(route);

    const config: AxiosRequestConfig = {
      url: request.url,
      method: request.method,
      headers: {
        'User-Agent': this.userAgent,
        ...request.headers,
      },
      data: request.body,
      timeout: request.timeoutMs,
      proxy: false,
      httpAgent,
      httpsAgent,
      maxRedirects: MAX_REDIRECTS,
      // Every status is a valid answer from the target; the router decides what to do with it
      validateStatus: () => true,
    };

    if (request.stream) {
      const response = await axios.request<Readable>({ ...config, responseType: 'stream' });
      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: Buffer.alloc(0),
        stream: response.data,
      };
    }

    const response = await axios.request<ArrayBuffer>({ ...config, responseType: 'arraybuffer' });
    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: Buffer.from(response.data),
      stream: null,
    };
  }
}
