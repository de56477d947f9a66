/**
 * Request Router
 * Sends requests through the overlay ingress or the ranked outproxies with fallback
 */

import {
  CandidatesExhaustedError,
  ConnectivityError,
  NoCandidatesError,
  ProtocolError,
} from '../errors';
import { OverlayController } from '../overlay/overlay.types';
import { ProxyRecord } from '../proxy/proxy.types';
import { isOverlayDomain } from '../proxy/proxy.record';
import { ProxySelector } from '../selection/proxy.selector';
import { OverlayIngress, ingressRouteFor, sendThroughProxy } from '../transport/proxy.dialer';
import { HttpTransport, OutboundRequest, TransportResponse } from '../transport/transport.types';
import { env } from '../../config/env';
import { classifyFailure, toRouteError } from './failure.classifier';
import { RequestExecutor, RouteRequest, RoutedResponse, RouterConfig } from './routing.types';

// Outproxy could not reach or hear back from the target
const GATEWAY_FAILURE_STATUSES = new Set([502, 504]);
const PROXY_AUTH_REQUIRED = 407;

export class RequestRouter implements RequestExecutor {
  private readonly selector: ProxySelector;
  private readonly transport: HttpTransport;
  private readonly overlay: OverlayController | null;
  private readonly candidateCount: number;
  private readonly timeoutMs: number;
  private readonly ingress: OverlayIngress;

  constructor(
    selector: ProxySelector,
    transport: HttpTransport,
    overlay: OverlayController | null = null,
    config?: RouterConfig
  ) {
    this.selector = selector;
    this.transport = transport;
    this.overlay = overlay;
    const candidateCount = config?.candidateCount ?? env.ROUTE_CANDIDATE_COUNT;
    if (!Number.isInteger(candidateCount) || candidateCount < 1) {
      throw new Error(`Route candidate count must be a positive integer, got ${candidateCount}`);
    }
    this.candidateCount = candidateCount;
    this.timeoutMs = config?.timeoutMs ?? env.ROUTE_TIMEOUT;
    this.ingress = config?.ingress ?? {
      httpProxyUrl: env.OVERLAY_HTTP_PROXY_URL,
      httpsProxyUrl: env.OVERLAY_HTTPS_PROXY_URL,
    };
  }

  async route(request: RouteRequest, discoveredRecords?: readonly ProxyRecord[]): Promise<RoutedResponse> {
    let target: URL;
    try {
      target = new URL(request.url);
    } catch (error) {
      throw new ProtocolError(`Invalid URL: ${request.url}`, undefined, { cause: error });
    }

    const outbound: OutboundRequest = {
      url: request.url,
      method: request.method ?? 'GET',
      headers: request.headers,
      body: request.body,
      stream: request.stream ?? false,
      timeoutMs: request.timeoutMs ?? this.timeoutMs,
    };

    if (isOverlayDomain(target.hostname)) {
      return this.routeThroughOverlay(outbound);
    }
    return this.routeThroughCandidates(outbound, discoveredRecords);
  }

  /**
   * Overlay hosts go through the single local ingress; the selector is never consulted
   */
  private async routeThroughOverlay(outbound: OutboundRequest): Promise<RoutedResponse> {
    if (this.overlay) {
      await this.overlay.ensureRunning();
    }

    const route = ingressRouteFor(outbound.url, this.ingress);
    console.log(`Routing ${outbound.method} ${outbound.url} through overlay ingress ${route.proxyUrl}`);

    try {
      const response = await this.transport.send(outbound, route);
      return this.toRouted(response, route.proxyUrl, 1);
    } catch (error) {
      throw toRouteError(error, route.proxyUrl);
    }
  }

  private async routeThroughCandidates(
    outbound: OutboundRequest,
    discoveredRecords?: readonly ProxyRecord[]
  ): Promise<RoutedResponse> {
    const candidates = await this.selector.ensureFreshN(discoveredRecords, this.candidateCount);
    if (candidates.length === 0) {
      throw new NoCandidatesError(outbound.url);
    }

    let lastError: Error | null = null;
    let attempts = 0;

    for (const candidate of candidates) {
      attempts++;
      const proxy = candidate.record;

      try {
        const { response } = await sendThroughProxy(this.transport, outbound, proxy);
        this.checkProxyAnswer(response, proxy);
        console.log(`Routed ${outbound.method} ${outbound.url} via ${proxy.url} (attempt ${attempts})`);
        return this.toRouted(response, proxy.url, attempts);
      } catch (error) {
        const routeError = toRouteError(error, proxy.url);
        if (!classifyFailure(routeError).retryable) {
          console.error(`Request to ${outbound.url} failed via ${proxy.url}: ${routeError.message}`);
          throw routeError;
        }

        console.warn(`Proxy ${proxy.url} failed (attempt ${attempts}/${candidates.length}): ${routeError.message}`);
        this.selector.reportFailure(proxy);
        lastError = routeError;
      }
    }

    throw new CandidatesExhaustedError(
      attempts,
      lastError ?? new ConnectivityError(`No attempt succeeded for ${outbound.url}`)
    );
  }

  /**
   * Answers the outproxy itself produced rather than the target
   */
  private checkProxyAnswer(response: TransportResponse, proxy: ProxyRecord): void {
    if (GATEWAY_FAILURE_STATUSES.has(response.status)) {
      response.stream?.destroy();
      throw new ConnectivityError(`Proxy gateway responded with HTTP ${response.status} (via ${proxy.url})`, proxy.url);
    }
    if (response.status === PROXY_AUTH_REQUIRED) {
      response.stream?.destroy();
      throw new ProtocolError(`Proxy authentication required (via ${proxy.url})`, proxy.url);
    }
  }

  private toRouted(response: TransportResponse, proxyUsed: string, attempts: number): RoutedResponse {
    return {
      status: response.status,
      headers: response.headers,
      body: response.body,
      bodyStream: response.stream,
      proxyUsed,
      attempts,
    };
  }
}
