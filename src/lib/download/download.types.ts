/**
 * Download Types
 */

import { ProxyRecord } from '../proxy/proxy.types';

export interface ByteRange {
  index: number;
  start: number;
  end: number;         // inclusive
}

export interface DownloadOptions {
  chunks?: number;
  headers?: Record<string, string>;
  timeoutMs?: number;
  records?: readonly ProxyRecord[];
}

export interface DownloadResult {
  data: Buffer;
  size: number;
  parallel: boolean;       // false when the server offered no byte ranges
  chunks: number;
  proxiesUsed: string[];
}
