/**
 * Graceful Shutdown Manager
 *
 * Runs shutdown callbacks once, bounded by a timeout, and wires them to
 * process signals for single-process deployments.
 */

import type { Logger } from './types';

export type ShutdownPhase = 'idle' | 'shutting_down' | 'done';

export interface ShutdownManagerOptions {
  /** Upper bound (ms) on the whole shutdown */
  timeout: number;
  logger?: Logger;
  exit?: (code: number) => void;
}

export class ShutdownManager {
  private phase: ShutdownPhase = 'idle';
  private shutdownCallbacks: Array<() => Promise<void>> = [];
  private signalHandlers = new Map<NodeJS.Signals, () => void>();
  private pending: Promise<boolean> | null = null;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly exit: (code: number) => void;

  constructor(options: ShutdownManagerOptions) {
    this.timeout = options.timeout;
    this.logger = options.logger ?? console;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  getPhase(): ShutdownPhase {
    return this.phase;
  }

  /**
   * Register shutdown callback
   */
  onShutdown(callback: () => Promise<void>): void {
    this.shutdownCallbacks.push(callback);
  }

  /**
   * Run every callback once. Resolves true when all of them succeeded within the
   * timeout; repeated calls share the first run.
   */
  shutdown(): Promise<boolean> {
    if (!this.pending) {
      this.pending = this.run();
    }
    return this.pending;
  }

  private async run(): Promise<boolean> {
    this.phase = 'shutting_down';

    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<boolean>((resolve) => {
      timeoutId = setTimeout(() => {
        this.logger.warn('[siteserve] shutdown timeout reached, forcing exit');
        resolve(false);
      }, this.timeout);
      // Don't keep the event loop alive (important for Jest)
      timeoutId.unref?.();
    });

    const ok = await Promise.race([this.executeCallbacks(), timeoutPromise]);
    clearTimeout(timeoutId);
    this.phase = 'done';
    return ok;
  }

  /**
   * Execute all shutdown callbacks
   */
  private async executeCallbacks(): Promise<boolean> {
    const results = await Promise.allSettled(this.shutdownCallbacks.map((callback) => callback()));

    let ok = true;
    for (const result of results) {
      if (result.status === 'rejected') {
        ok = false;
        this.logger.error('[siteserve] shutdown callback error:', result.reason);
      }
    }
    return ok;
  }

  /**
   * Shut down and exit on SIGTERM / SIGINT
   */
  setupSignalHandlers(signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT']): void {
    for (const signal of signals) {
      const handler = () => {
        this.logger.info(`[siteserve] received ${signal}, shutting down gracefully...`);
        void this.shutdown().then((ok) => {
          this.exit(ok ? 0 : 1);
        });
      };

      process.on(signal, handler);
      this.signalHandlers.set(signal, handler);
    }
  }

  /**
   * Remove signal handlers
   */
  removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers.entries()) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers.clear();
  }
}

/**
 * Factory function
 */
export function createShutdownManager(options: ShutdownManagerOptions): ShutdownManager {
  return new ShutdownManager(options);
}
