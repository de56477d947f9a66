/**
 * Attached Router Binding
 * For a router that is already running outside this process
 */

import { OverlayRouterBinding } from './overlay.types';

export class AttachedRouterBinding implements OverlayRouterBinding {
  async init(_configDir: string): Promise<number> {
    return 0;
  }

  async start(): Promise<number> {
    return 0;
  }

  async stop(): Promise<number> {
    return 0;
  }

  async cleanup(): Promise<void> {
    return;
  }

  isRunning(): boolean {
    return true;
  }
}
