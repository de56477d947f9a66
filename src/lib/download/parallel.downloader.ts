/**
 * Parallel Downloader
 * Fetches large resources as concurrent byte ranges through the request router
 */

import { runPool } from '../concurrency/worker.pool';
import { DownloadError } from '../errors';
import { describeError } from '../routing/failure.classifier';
import { RequestExecutor, RouteRequest, RoutedResponse } from '../routing/routing.types';
import { env } from '../../config/env';
import { ByteRange, DownloadOptions, DownloadResult } from './download.types';

interface DownloadedChunk {
  index: number;
  data: Buffer;
  proxyUsed: string;
}

/**
 * Split `size` bytes into `chunks` inclusive ranges; the last range takes the remainder
 */
export function splitRanges(size: number, chunks: number): ByteRange[] {
  const count = Math.max(1, Math.min(Math.floor(chunks), size));
  const chunkSize = Math.floor(size / count);

  return Array.from({ length: count }, (_, index) => ({
    index,
    start: index * chunkSize,
    end: index === count - 1 ? size - 1 : (index + 1) * chunkSize - 1,
  }));
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class ParallelDownloader {
  private readonly router: RequestExecutor;
  private readonly defaultChunks: number;

  constructor(router: RequestExecutor, defaultChunks: number = env.DOWNLOAD_CHUNKS) {
    this.router = router;
    this.defaultChunks = defaultChunks;
  }

  async download(url: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    const head = await this.router.route(this.request(url, 'HEAD', options), options.records);

    const size = parseInt(head.headers['content-length'] ?? '', 10);
    const acceptsRanges = (head.headers['accept-ranges'] ?? '').toLowerCase().includes('bytes');
    const chunks = Math.max(1, Math.floor(options.chunks ?? this.defaultChunks));

    if (!isSuccess(head.status) || !acceptsRanges || !Number.isFinite(size) || size <= 0 || chunks === 1) {
      console.log(`Downloading ${url} in a single request`);
      return this.downloadWhole(url, options);
    }

    const ranges = splitRanges(size, chunks);
    console.log(`Downloading ${url} (${size} bytes) in ${ranges.length} chunks`);

    const parts = await runPool(ranges, ranges.length, (range) => this.downloadRange(url, range, options));
    parts.sort((a, b) => a.index - b.index);

    const data = Buffer.concat(parts.map((part) => part.data));
    if (data.length !== size) {
      throw new DownloadError(`Downloaded ${data.length} of ${size} bytes from ${url}`);
    }

    return {
      data,
      size,
      parallel: true,
      chunks: ranges.length,
      proxiesUsed: [...new Set(parts.map((part) => part.proxyUsed))],
    };
  }

  private async downloadRange(url: string, range: ByteRange, options: DownloadOptions): Promise<DownloadedChunk> {
    const label = `Chunk ${range.index} (bytes ${range.start}-${range.end})`;
    const request = this.request(url, 'GET', options, { Range: `bytes=${range.start}-${range.end}` });

    let response: RoutedResponse;
    try {
      response = await this.router.route(request, options.records);
    } catch (error) {
      throw new DownloadError(`${label} failed: ${describeError(error)}`, range.index, { cause: error });
    }

    if (response.status !== 206) {
      throw new DownloadError(`${label} expected HTTP 206, got ${response.status}`, range.index);
    }

    const expected = range.end - range.start + 1;
    if (response.body.length !== expected) {
      throw new DownloadError(`${label} returned ${response.body.length} of ${expected} bytes`, range.index);
    }

    return { index: range.index, data: response.body, proxyUsed: response.proxyUsed };
  }

  private async downloadWhole(url: string, options: DownloadOptions): Promise<DownloadResult> {
    const response = await this.router.route(this.request(url, 'GET', options), options.records);
    if (!isSuccess(response.status)) {
      throw new DownloadError(`Download of ${url} failed with HTTP ${response.status}`);
    }

    return {
      data: response.body,
      size: response.body.length,
      parallel: false,
      chunks: 1,
      proxiesUsed: [response.proxyUsed],
    };
  }

  private request(
    url: string,
    method: 'HEAD' | 'GET',
    options: DownloadOptions,
    extraHeaders: Record<string, string> = {}
  ): RouteRequest {
    return {
      url,
      method,
      headers: { ...options.headers, ...extraHeaders },
      timeoutMs: options.timeoutMs,
    };
  }
}
