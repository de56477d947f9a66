/**
 * Failure Classification
 * Splits request failures into connectivity (retry on next proxy) and protocol (abort)
 */

import { ConnectivityError, ProtocolError } from '../errors';

export enum FailureType {
  CONNECTIVITY = 'connectivity',
  PROTOCOL = 'protocol',
}

export interface ClassifiedFailure {
  type: FailureType;
  reason: string;
  code?: string;
  retryable: boolean;
  socks: boolean;       // SOCKS connection could not be set up (handshake, auth, connect)
}

const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_CANCELED',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const PROTOCOL_CODES = new Set([
  'ERR_BAD_RESPONSE',
  'ERR_BAD_REQUEST',
  'ERR_INVALID_URL',
  'ERR_FR_TOO_MANY_REDIRECTS',
  'ERR_BAD_OPTION_VALUE',
  'ERR_NOT_SUPPORT',
  'Z_DATA_ERROR',
  'Z_BUF_ERROR',
]);

const MAX_CAUSE_DEPTH = 5;

function readField(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}

/**
 * The error followed by its `cause` chain
 */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = typeof current === 'object' ? Reflect.get(current, 'cause') : undefined;
  }
  return chain;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

function connectivity(reason: string, code?: string, socks = false): ClassifiedFailure {
  return { type: FailureType.CONNECTIVITY, reason, code, retryable: true, socks };
}

function protocol(reason: string, code?: string): ClassifiedFailure {
  return { type: FailureType.PROTOCOL, reason, code, retryable: false, socks: false };
}

/**
 * Classify an error by structured kind first (error class, `code`, `name` along the cause chain),
 * falling back to message inspection only when no link carries a known kind
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  const reason = describeError(error);
  const chain = causeChain(error);

  for (const link of chain) {
    if (link instanceof ConnectivityError) return connectivity(reason, link.code);
    if (link instanceof ProtocolError) return protocol(reason, link.code);

    if (readField(link, 'name') === 'SocksClientError') {
      return connectivity(reason, 'SOCKS', true);
    }

    const code = readField(link, 'code');
    if (!code) continue;
    if (CONNECTIVITY_CODES.has(code)) return connectivity(reason, code);
    if (PROTOCOL_CODES.has(code) || code.startsWith('HPE_')) return protocol(reason, code);
  }

  const message = chain.map((link) => readField(link, 'message') ?? '').join(' ').toLowerCase();

  if (message.includes('socks')) {
    return connectivity(reason, undefined, true);
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('refused') ||
    message.includes('socket hang up') ||
    message.includes('reset') ||
    message.includes('unreachable') ||
    message.includes('getaddrinfo') ||
    message.includes('network')
  ) {
    return connectivity(reason);
  }

  if (
    message.includes('parse') ||
    message.includes('malformed') ||
    message.includes('invalid') ||
    message.includes('unexpected')
  ) {
    return protocol(reason);
  }

  // Unknown failures: another proxy may still succeed
  return connectivity(reason);
}

/**
 * Wrap a raw failure in the router's typed error
 */
export function toRouteError(error: unknown, proxyUsed?: string): ConnectivityError | ProtocolError {
  if (error instanceof ConnectivityError || error instanceof ProtocolError) return error;

  const failure = classifyFailure(error);
  const message = proxyUsed ? `${failure.reason} (via ${proxyUsed})` : failure.reason;
  return failure.type === FailureType.CONNECTIVITY
    ? new ConnectivityError(message, proxyUsed, { cause: error })
    : new ProtocolError(message, proxyUsed, { cause: error });
}
