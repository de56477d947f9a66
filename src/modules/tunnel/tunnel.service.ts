/**
 * Tunnel Service
 * Client-facing entry point: discovery, benchmarking, routing and downloads wired together
 */

import { ProxyBenchmark } from '../../lib/benchmark/proxy.benchmark';
import { ProxyDiscovery } from '../../lib/discovery/proxy.discovery';
import { DownloadOptions, DownloadResult } from '../../lib/download/download.types';
import { ParallelDownloader } from '../../lib/download/parallel.downloader';
import { AttachedRouterBinding } from '../../lib/overlay/attached.binding';
import { DaemonRouterBinding } from '../../lib/overlay/daemon.binding';
import { OverlayRouter } from '../../lib/overlay/overlay.router';
import { BenchmarkResult, ProxyRecord } from '../../lib/proxy/proxy.types';
import { isOverlayUrl } from '../../lib/proxy/proxy.record';
import { describeError } from '../../lib/routing/failure.classifier';
import { RequestRouter } from '../../lib/routing/request.router';
import { RoutedResponse } from '../../lib/routing/routing.types';
import { ProxySelector } from '../../lib/selection/proxy.selector';
import { AxiosTransport } from '../../lib/transport/axios.transport';
import { HttpMethod } from '../../lib/transport/transport.types';
import { env } from '../../config/env';
import { RequestOptions, TunnelServiceConfig, TunnelStatus } from './tunnel.types';

export interface TunnelComponents {
  overlay: OverlayRouter;
  discovery: ProxyDiscovery;
  benchmark: ProxyBenchmark;
  selector: ProxySelector;
  router: RequestRouter;
  downloader: ParallelDownloader;
}

export class TunnelService {
  private readonly components: TunnelComponents;
  private readonly retestIntervalMs: number;
  private readonly clock: () => number;
  private records: ProxyRecord[] = [];
  private discoveredAt: number | null = null;
  private discovering: Promise<void> | null = null;

  constructor(components: TunnelComponents, retestIntervalMs: number = env.RETEST_INTERVAL, clock: () => number = Date.now) {
    this.components = components;
    this.retestIntervalMs = retestIntervalMs;
    this.clock = clock;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<RoutedResponse> {
    const records = isOverlayUrl(url) ? undefined : await this.knownProxies();
    return this.components.router.route({ url, method, ...options }, records);
  }

  async get(url: string, options: RequestOptions = {}): Promise<RoutedResponse> {
    return this.request('GET', url, options);
  }

  async post(url: string, body: Buffer | string, options: RequestOptions = {}): Promise<RoutedResponse> {
    return this.request('POST', url, { ...options, body });
  }

  /**
   * Fetch the outproxy directory now and remember the result. Concurrent callers share one fetch.
   */
  async fetchProxies(): Promise<ProxyRecord[]> {
    if (!this.discovering) {
      this.discovering = this.components.discovery
        .discover()
        .then((records) => {
          this.records = records;
          this.discoveredAt = this.clock();
        })
        .finally(() => {
          this.discovering = null;
        });
    }

    await this.discovering;
    return [...this.records];
  }

  /**
   * Probe the given proxies, or the known ones when none are given
   */
  async benchmarkProxies(records?: readonly ProxyRecord[]): Promise<BenchmarkResult[]> {
    const targets = records && records.length > 0 ? records : await this.knownProxies();
    return this.components.benchmark.probeMany(targets);
  }

  async download(url: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    const records = options.records ?? (isOverlayUrl(url) ? undefined : await this.knownProxies());
    return this.components.downloader.download(url, { ...options, records });
  }

  getStatus(): TunnelStatus {
    return {
      overlay: this.components.overlay.getStatus(),
      selector: this.components.selector.getStats(),
      directory: this.components.discovery.getBreakerStats(),
      knownProxies: [...this.records],
      discoveredAt: this.discoveredAt,
    };
  }

  async shutdown(): Promise<void> {
    console.log('Shutting down tunnel service');
    this.components.discovery.shutdown();
    await this.components.overlay.shutdown();
  }

  /**
   * Known records, rediscovered once the retest interval has passed.
   * A failed rediscovery keeps the previous list.
   */
  private async knownProxies(): Promise<ProxyRecord[]> {
    const stale = this.discoveredAt === null || this.clock() - this.discoveredAt >= this.retestIntervalMs;
    if (stale) {
      try {
        await this.fetchProxies();
      } catch (error) {
        console.error(`Proxy discovery failed, keeping ${this.records.length} known proxies: ${describeError(error)}`);
      }
    }
    return this.records;
  }
}

/**
 * Wire the default stack: axios transport, i2pd daemon (or an attached router), env configuration
 */
export function createTunnelService(config: TunnelServiceConfig = {}): TunnelService {
  const transport = config.transport ?? new AxiosTransport();
  const binding = config.binding ?? (env.OVERLAY_ATTACHED ? new AttachedRouterBinding() : new DaemonRouterBinding());
  const retestIntervalMs = config.retestIntervalMs ?? env.RETEST_INTERVAL;
  const clock = config.clock ?? Date.now;

  const overlay = new OverlayRouter(binding, { configDir: config.configDir });
  const discovery = new ProxyDiscovery(transport, overlay, {
    directoryUrl: config.directoryUrl,
    ingress: overlay.ingress,
  });
  const benchmark = new ProxyBenchmark(transport, { testUrl: config.benchmarkUrl });
  const selector = new ProxySelector(benchmark, null, { retestIntervalMs, clock });
  const router = new RequestRouter(selector, transport, overlay, {
    candidateCount: config.candidateCount,
    ingress: overlay.ingress,
  });
  const downloader = new ParallelDownloader(router, config.downloadChunks);

  return new TunnelService(
    { overlay, discovery, benchmark, selector, router, downloader },
    retestIntervalMs,
    clock
  );
}
