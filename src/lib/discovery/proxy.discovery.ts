/**
 * Proxy Discovery
 * Fetches the outproxy directory through the overlay router and parses it
 */

import { CircuitBreaker } from '../circuit-breaker/circuit-breaker.manager';
import { CircuitBreakerStats } from '../circuit-breaker/circuit-breaker.types';
import { DiscoveryError } from '../errors';
import { OverlayController } from '../overlay/overlay.types';
import { ProxyRecord } from '../proxy/proxy.types';
import { describeError } from '../routing/failure.classifier';
import { OverlayIngress, ingressRouteFor } from '../transport/proxy.dialer';
import { HttpTransport } from '../transport/transport.types';
import { env } from '../../config/env';
import { parseDirectory } from './directory.parser';
import { DiscoveryConfig, ProxySource } from './discovery.types';

export class ProxyDiscovery implements ProxySource {
  private readonly transport: HttpTransport;
  private readonly overlay: OverlayController | null;
  private readonly directoryUrl: string;
  private readonly timeoutMs: number;
  private readonly ingress: OverlayIngress;
  private readonly breaker: CircuitBreaker<[], string>;

  constructor(transport: HttpTransport, overlay: OverlayController | null = null, config?: DiscoveryConfig) {
    this.transport = transport;
    this.overlay = overlay;
    this.directoryUrl = config?.directoryUrl ?? env.DIRECTORY_URL;
    this.timeoutMs = config?.timeoutMs ?? env.DISCOVERY_TIMEOUT;
    this.ingress = config?.ingress ?? {
      httpProxyUrl: env.OVERLAY_HTTP_PROXY_URL,
      httpsProxyUrl: env.OVERLAY_HTTPS_PROXY_URL,
    };
    this.breaker = new CircuitBreaker(() => this.fetchDirectory(), {
      name: 'proxy-directory',
      ...config?.circuitBreaker,
    });
  }

  /**
   * Fetch and parse the directory. An empty list means no candidates, not a failure.
   */
  async discover(): Promise<ProxyRecord[]> {
    if (this.overlay) {
      await this.overlay.ensureRunning();
    }

    console.log(`Fetching proxy list from ${this.directoryUrl}`);

    let html: string;
    try {
      html = await this.breaker.execute();
    } catch (error) {
      if (error instanceof DiscoveryError) {
        throw error;
      }
      throw new DiscoveryError(
        `Failed to fetch proxy list from ${this.directoryUrl}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const records = parseDirectory(html);
    if (records.length === 0) {
      console.warn(`No proxies found in ${this.directoryUrl}, returning empty list`);
    } else {
      console.log(`Parsed ${records.length} unique proxies`);
    }
    return records;
  }

  getBreakerStats(): CircuitBreakerStats {
    return this.breaker.getStats();
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async fetchDirectory(): Promise<string> {
    const response = await this.transport.send(
      { url: this.directoryUrl, method: 'GET', timeoutMs: this.timeoutMs },
      ingressRouteFor(this.directoryUrl, this.ingress)
    );

    if (response.status < 200 || response.status >= 300) {
      throw new DiscoveryError(`Proxy directory responded with HTTP ${response.status}`);
    }

    return response.body.toString('utf8');
  }
}
