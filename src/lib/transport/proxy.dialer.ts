/**
 * Proxy Dialer
 * Turns a proxy record into ordered dial routes and sends through them
 */

import { ProxyKind, ProxyRecord } from '../proxy/proxy.types';
import { classifyFailure, describeError } from '../routing/failure.classifier';
import { DialRoute, HttpTransport, OutboundRequest, TransportResponse } from './transport.types';

export interface OverlayIngress {
  httpProxyUrl: string;     // plain HTTP forwarding
  httpsProxyUrl: string;    // CONNECT forwarding for https: targets
}

export interface DialResult {
  response: TransportResponse;
  route: DialRoute;
}

/**
 * Routes to try, in order. SOCKS proxies fall back to an HTTPS tunnel on the same host:port.
 */
export function dialRoutesFor(record: ProxyRecord): DialRoute[] {
  const address = `${record.host}:${record.port}`;

  switch (record.kind) {
    case ProxyKind.SOCKS_LIKE:
      return [
        { scheme: 'socks5', proxyUrl: `socks5://${address}` },
        { scheme: 'https', proxyUrl: `https://${address}` },
      ];
    case ProxyKind.ENCRYPTED:
      return [{ scheme: 'https', proxyUrl: `https://${address}` }];
    case ProxyKind.PLAIN:
    default:
      return [{ scheme: 'http', proxyUrl: `http://${address}` }];
  }
}

/**
 * Local ingress of the overlay router, picked by the target's scheme
 */
export function ingressRouteFor(targetUrl: string, ingress: OverlayIngress): DialRoute {
  const isEncrypted = new URL(targetUrl).protocol === 'https:';
  return {
    scheme: 'http',
    proxyUrl: isEncrypted ? ingress.httpsProxyUrl : ingress.httpProxyUrl,
  };
}

/**
 * Send through a proxy record, moving to the fallback route only when SOCKS setup fails
 */
export async function sendThroughProxy(
  transport: HttpTransport,
  request: OutboundRequest,
  record: ProxyRecord
): Promise<DialResult> {
  const routes = dialRoutesFor(record);

  for (let i = 0; i < routes.length; i++) {
    const route = routes[i];
    const hasFallback = i < routes.length - 1;

    try {
      const response = await transport.send(request, route);
      return { response, route };
    } catch (error) {
      if (route.scheme === 'socks5' && hasFallback && classifyFailure(error).socks) {
        console.warn(`SOCKS setup failed for ${record.url}, falling back to HTTPS: ${describeError(error)}`);
        continue;
      }
      throw error;
    }
  }

  throw new Error(`No dial route for ${record.url}`);
}
