/**
 * Tunnel Errors
 * Error classes surfaced by discovery, routing and the overlay router adapter
 */

export abstract class TunnelError extends Error {
  public abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Directory page could not be fetched or read. Zero proxies found is not an error.
 */
export class DiscoveryError extends TunnelError {
  public readonly code = 'ERR_DISCOVERY';
}

/**
 * Unreachable, refused, reset, timed out or SOCKS connect failure. Retried on the next candidate.
 */
export class ConnectivityError extends TunnelError {
  public readonly code = 'ERR_CONNECTIVITY';

  constructor(message: string, public readonly proxyUsed?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Malformed or rejected exchange. Never retried on another candidate.
 */
export class ProtocolError extends TunnelError {
  public readonly code = 'ERR_PROTOCOL';

  constructor(message: string, public readonly proxyUsed?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type RouterStep = 'init' | 'start' | 'stop';

/**
 * Overlay router returned a non-zero code. Fatal for the current request.
 */
export class RouterInitError extends TunnelError {
  public readonly code = 'ERR_ROUTER_INIT';

  constructor(public readonly step: RouterStep, public readonly exitCode: number, options?: { cause?: unknown }) {
    super(`Overlay router ${step} failed with code ${exitCode}`, options);
  }
}

export class NoCandidatesError extends TunnelError {
  public readonly code = 'ERR_NO_CANDIDATES';

  constructor(target: string) {
    super(`No available proxy candidates for ${target}`);
  }
}

/**
 * Every ranked candidate failed with a connectivity error
 */
export class CandidatesExhaustedError extends TunnelError {
  public readonly code = 'ERR_CANDIDATES_EXHAUSTED';

  constructor(public readonly attempts: number, public readonly lastError: Error) {
    super(`All ${attempts} proxy candidate(s) failed; last error: ${lastError.message}`, { cause: lastError });
  }
}

export class DownloadError extends TunnelError {
  public readonly code = 'ERR_DOWNLOAD';

  constructor(message: string, public readonly chunkIndex?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}
