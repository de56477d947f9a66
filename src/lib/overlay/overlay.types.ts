/**
 * Overlay Router Types
 * Contract for the local I2P router process and its forward-proxy ingress
 */

/**
 * Native-style router calls. `init`, `start` and `stop` resolve to 0 on success
 * and a non-zero failure code otherwise.
 */
export interface OverlayRouterBinding {
  init(configDir: string): Promise<number>;
  start(): Promise<number>;
  stop(): Promise<number>;
  cleanup(): Promise<void>;
  isRunning(): boolean;
}

export interface OverlayRouterConfig {
  configDir?: string;
  httpProxyUrl?: string;     // local plain HTTP forward proxy
  httpsProxyUrl?: string;    // local forward proxy used for https: targets
}

/**
 * What callers outside this module need from the router
 */
export interface OverlayController {
  ensureRunning(): Promise<void>;
}

export interface OverlayRouterStatus {
  initialized: boolean;
  running: boolean;
  httpProxyUrl: string;
  httpsProxyUrl: string;
}
