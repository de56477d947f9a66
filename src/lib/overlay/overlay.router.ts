/**
 * Overlay Router
 * Lifecycle wrapper around an OverlayRouterBinding (init, start, stop, ensure-running)
 */

import { RouterInitError, RouterStep } from '../errors';
import { describeError } from '../routing/failure.classifier';
import { OverlayIngress } from '../transport/proxy.dialer';
import { env } from '../../config/env';
import {
  OverlayController,
  OverlayRouterBinding,
  OverlayRouterConfig,
  OverlayRouterStatus,
} from './overlay.types';

const BINDING_FAILURE_CODE = -1;

export class OverlayRouter implements OverlayController {
  private readonly binding: OverlayRouterBinding;
  private readonly config: Required<OverlayRouterConfig>;
  private initialized = false;
  private running = false;
  private starting: Promise<void> | null = null;

  constructor(binding: OverlayRouterBinding, config?: OverlayRouterConfig) {
    this.binding = binding;
    this.config = {
      configDir: config?.configDir ?? env.OVERLAY_CONFIG_DIR,
      httpProxyUrl: config?.httpProxyUrl ?? env.OVERLAY_HTTP_PROXY_URL,
      httpsProxyUrl: config?.httpsProxyUrl ?? env.OVERLAY_HTTPS_PROXY_URL,
    };
  }

  get ingress(): OverlayIngress {
    return {
      httpProxyUrl: this.config.httpProxyUrl,
      httpsProxyUrl: this.config.httpsProxyUrl,
    };
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }

    console.log(`Initializing overlay router (config dir: ${this.config.configDir})`);
    await this.call('init', () => this.binding.init(this.config.configDir));
    this.initialized = true;
  }

  async start(): Promise<void> {
    if (this.running && this.binding.isRunning()) {
      return;
    }

    await this.init();
    console.log('Starting overlay router');
    await this.call('start', () => this.binding.start());
    this.running = true;
    console.log(
      `Overlay router started (HTTP ingress ${this.config.httpProxyUrl}, HTTPS ingress ${this.config.httpsProxyUrl})`
    );
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    console.log('Stopping overlay router');
    await this.call('stop', () => this.binding.stop());
    this.running = false;
  }

  /**
   * Running only when both our own state and the binding agree
   */
  isRunning(): boolean {
    return this.running && this.binding.isRunning();
  }

  /**
   * Init and start when needed. Concurrent callers share one start.
   */
  async ensureRunning(): Promise<void> {
    if (this.isRunning()) {
      return;
    }

    if (!this.starting) {
      this.starting = this.start().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  async shutdown(): Promise<void> {
    await this.stop();
    await this.binding.cleanup();
    this.initialized = false;
  }

  getStatus(): OverlayRouterStatus {
    return {
      initialized: this.initialized,
      running: this.isRunning(),
      httpProxyUrl: this.config.httpProxyUrl,
      httpsProxyUrl: this.config.httpsProxyUrl,
    };
  }

  private async call(step: RouterStep, fn: () => Promise<number>): Promise<void> {
    let code: number;
    try {
      code = await fn();
    } catch (error) {
      console.error(`Overlay router ${step} threw: ${describeError(error)}`);
      throw new RouterInitError(step, BINDING_FAILURE_CODE, { cause: error });
    }

    if (code !== 0) {
      console.error(`Overlay router ${step} returned code ${code}`);
      throw new RouterInitError(step, code);
    }
  }
}
