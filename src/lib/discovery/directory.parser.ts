/**
 * Directory Parser
 * Extracts outproxy records from the directory page HTML
 */

import * as cheerio from 'cheerio';
import { ProxyKind, ProxyRecord } from '../proxy/proxy.types';
import {
  createProxyRecord,
  dedupeRecords,
  isOverlayDomain,
  isValidPort,
  kindFromLabel,
} from '../proxy/proxy.record';

const DEFAULT_TLS_PORT = 443;
const BARE_PORT_ALLOW_LIST = new Set([443, 1080, 8443]);

const HTTPS_OVERLAY_URL = /https:\/\/([a-z0-9][a-z0-9.-]*\.i2p)(?::(\d{1,5}))?/gi;
const BARE_OVERLAY_PAIR = /(?<![\w./-])([a-z0-9][a-z0-9.-]*\.i2p):(\d{1,5})\b/gi;

const BLOCK_ELEMENTS = 'p, div, li, td, th, tr, h1, h2, h3, h4, h5, h6, pre, section, article, span, a';

function parsePort(value: string | undefined, fallback?: number): number | null {
  if (!value) return fallback ?? null;
  const port = parseInt(value.trim(), 10);
  return isValidPort(port) ? port : null;
}

/**
 * Address cells sometimes carry a scheme or a trailing path
 */
function cleanAddress(value: string): string {
  return value.trim().replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').replace(/[/:].*$/, '');
}

/**
 * A structured row (address, port, uptime, type). Only https and socks-family rows on overlay hosts count.
 */
function recordFromRow(address: string, portText: string, type: string): ProxyRecord | null {
  const kind = kindFromLabel(type);
  if (kind !== ProxyKind.ENCRYPTED && kind !== ProxyKind.SOCKS_LIKE) return null;

  const host = cleanAddress(address);
  if (!isOverlayDomain(host)) return null;

  const port = parsePort(portText);
  if (port === null) return null;

  return createProxyRecord(host, port, type.trim().toLowerCase());
}

function recordFromHttpsUrl(value: string): ProxyRecord | null {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return null;
  }
  if (url.protocol !== 'https:' || !isOverlayDomain(url.hostname)) return null;

  const port = parsePort(url.port, DEFAULT_TLS_PORT);
  return port === null ? null : createProxyRecord(url.hostname, port, 'https');
}

/**
 * Parse the directory page. Table rows come first; link and text heuristics only add
 * records that are not already known. Duplicate host:port entries keep the first one.
 */
export function parseDirectory(html: string): ProxyRecord[] {
  const $ = cheerio.load(html);
  const found: ProxyRecord[] = [];

  const add = (record: ProxyRecord | null): void => {
    if (record) found.push(record);
  };

  // 1. Structured rows. Rejected rows are dropped so the heuristics cannot pick them up again.
  const rejectedRows = $('tr').filter((_, row) => {
    const cells = $(row).children('td');
    if (cells.length < 4) return false;

    const record = recordFromRow(cells.eq(0).text(), cells.eq(1).text(), cells.eq(3).text());
    add(record);
    return record === null;
  });
  rejectedRows.remove();

  // 2a. Anchor links to https overlay hosts
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href) add(recordFromHttpsUrl(href));
  });

  // Keep neighbouring cells and list items apart in the flattened text
  $('script, style').remove();
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).append(' ');
  const text = $.root().text();

  // 2b. https overlay URLs in free text
  for (const match of text.matchAll(HTTPS_OVERLAY_URL)) {
    const port = parsePort(match[2], DEFAULT_TLS_PORT);
    if (port !== null) add(createProxyRecord(match[1], port, 'https'));
  }

  // 2c. Bare host.i2p:port pairs on well-known proxy ports
  for (const match of text.matchAll(BARE_OVERLAY_PAIR)) {
    const port = parsePort(match[2]);
    if (port !== null && BARE_PORT_ALLOW_LIST.has(port)) {
      add(createProxyRecord(match[1], port));
    }
  }

  return dedupeRecords(found);
}
