/**
 * Daemon Router Binding
 * Supervises an i2pd daemon as a child process
 */

import { SpawnOptions, spawn as nodeSpawn } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { describeError } from '../routing/failure.classifier';
import { env } from '../../config/env';
import { OverlayRouterBinding } from './overlay.types';

/**
 * The part of a ChildProcess the binding relies on
 */
export interface DaemonProcess {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => DaemonProcess;

export interface DaemonBindingConfig {
  binary?: string;
  listenAddress?: string;
  httpProxyPort?: number;
  httpsProxyPort?: number;
  stopTimeoutMs?: number;
  spawn?: SpawnFn;
}

const TUNNELS_FILE = 'tunnels.conf';
const FAILURE = 1;

/**
 * Second forward proxy, used as the ingress for https: targets
 */
export function renderTunnelsConfig(address: string, port: number): string {
  return [
    '[https-ingress]',
    'type = httpproxy',
    `address = ${address}`,
    `port = ${port}`,
    '',
  ].join('\n');
}

export class DaemonRouterBinding implements OverlayRouterBinding {
  private readonly config: Required<DaemonBindingConfig>;
  private dataDir: string | null = null;
  private child: DaemonProcess | null = null;

  constructor(config?: DaemonBindingConfig) {
    this.config = {
      binary: config?.binary ?? env.OVERLAY_ROUTER_BINARY,
      listenAddress: config?.listenAddress ?? '127.0.0.1',
      httpProxyPort: config?.httpProxyPort ?? env.OVERLAY_HTTP_PROXY_PORT,
      httpsProxyPort: config?.httpsProxyPort ?? env.OVERLAY_HTTPS_PROXY_PORT,
      stopTimeoutMs: config?.stopTimeoutMs ?? 10000,
      spawn: config?.spawn ?? nodeSpawn,
    };
  }

  async init(configDir: string): Promise<number> {
    const dataDir = path.resolve(configDir);
    try {
      await fs.mkdir(dataDir, { recursive: true });
      await fs.writeFile(
        path.join(dataDir, TUNNELS_FILE),
        renderTunnelsConfig(this.config.listenAddress, this.config.httpsProxyPort)
      );
    } catch (error) {
      console.error(`Failed to prepare router data dir ${dataDir}: ${describeError(error)}`);
      return FAILURE;
    }

    this.dataDir = dataDir;
    return 0;
  }

  buildArgs(dataDir: string): string[] {
    return [
      `--datadir=${dataDir}`,
      `--tunconf=${path.join(dataDir, TUNNELS_FILE)}`,
      '--httpproxy.enabled=true',
      `--httpproxy.address=${this.config.listenAddress}`,
      `--httpproxy.port=${this.config.httpProxyPort}`,
    ];
  }

  async start(): Promise<number> {
    if (!this.dataDir) {
      console.error('Router binding started before init');
      return FAILURE;
    }
    if (this.isRunning()) {
      return 0;
    }

    const child = this.config.spawn(this.config.binary, this.buildArgs(this.dataDir), {
      stdio: 'ignore',
    });

    const spawned = await new Promise<boolean>((resolve) => {
      child.once('spawn', () => resolve(true));
      child.once('error', (error) => {
        console.error(`Failed to launch ${this.config.binary}: ${error.message}`);
        resolve(false);
      });
    });

    if (!spawned) {
      return FAILURE;
    }

    child.once('exit', (code, signal) => {
      console.warn(`Router process exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`);
      if (this.child === child) {
        this.child = null;
      }
    });

    this.child = child;
    return 0;
  }

  async stop(): Promise<number> {
    const child = this.child;
    if (!child || !this.isRunning()) {
      this.child = null;
      return 0;
    }

    const exited = new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.config.stopTimeoutMs);
      child.once('exit', () => {
        clearTimeout(timer);
        resolve(true);
      });
    });

    child.kill('SIGTERM');
    if (!(await exited)) {
      console.error(`Router process did not exit within ${this.config.stopTimeoutMs}ms`);
      return FAILURE;
    }

    this.child = null;
    return 0;
  }

  async cleanup(): Promise<void> {
    if (this.child && this.isRunning()) {
      this.child.kill('SIGKILL');
    }
    this.child = null;
    this.dataDir = null;
  }

  isRunning(): boolean {
    return this.child !== null && this.child.exitCode === null && this.child.signalCode === null;
  }
}
