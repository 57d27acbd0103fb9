/**
 * Network Listener
 *
 * One plain or TLS socket served as an asynchronous task
 */

import http from 'http';
import https from 'https';
import { readFileSync } from 'fs';
import type { Listener, ListenerAddress, ListenerOptions, Transport } from './types';
import { ListenerError } from './types';

type NodeServer = http.Server | https.Server;

export class NodeListener implements Listener {
  private server: NodeServer | null = null;
  private stopping = false;
  private done: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private readonly options: ListenerOptions;

  constructor(options: ListenerOptions) {
    this.options = options;
  }

  get transport(): Transport {
    return this.options.transport;
  }

  /**
   * Serve until shut down
   */
  run(): Promise<void> {
    if (this.done) {
      return this.done;
    }

    this.done = new Promise<void>((resolve, reject) => {
      let server: NodeServer;
      try {
        server = this.createServer();
      } catch (error) {
        reject(new ListenerError(this.transport, error));
        return;
      }
      this.server = server;

      server.on('error', (error) => {
        if (this.stopping) {
          resolve();
          return;
        }
        server.close();
        reject(new ListenerError(this.transport, error));
      });

      server.on('close', () => {
        resolve();
      });

      server.on('listening', () => {
        if (this.stopping) {
          // shutdown was requested before the bind completed
          server.close();
          return;
        }
        const address = this.address();
        if (address) {
          this.options.onListening?.(address);
        }
      });

      server.listen(this.options.port, this.options.host || undefined);
    });

    return this.done;
  }

  /**
   * Stop accepting connections; idle keep-alive sockets are closed at once and
   * busy ones once `timeout` ms have passed
   */
  shutdown(timeout: number): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    this.stopping = true;
    const server = this.server;
    if (!server || !this.done) {
      this.closing = Promise.resolve();
      return this.closing;
    }

    if (!server.listening) {
      // Bind still pending or already failed; the run settles either way
      this.closing = this.done.then(
        () => undefined,
        () => undefined
      );
      return this.closing;
    }

    this.closing = new Promise<void>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        server.closeAllConnections();
      }, timeout);
      // Don't keep the event loop alive (important for Jest)
      timeoutId.unref?.();

      server.close((err) => {
        clearTimeout(timeoutId);
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });

    return this.closing;
  }

  /**
   * Get bound address
   */
  address(): ListenerAddress | null {
    if (!this.server || !this.server.listening) {
      return null;
    }

    const address = this.server.address();
    if (!address || typeof address === 'string') {
      return null;
    }

    return {
      transport: this.transport,
      host: address.address,
      port: address.port,
    };
  }

  private createServer(): NodeServer {
    const requestListener: http.RequestListener = (req, res) => {
      this.options.handler(req, res).catch(() => {
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end();
      });
    };

    if (this.options.transport === 'http') {
      return http.createServer(requestListener);
    }

    const tls = this.options.tls;
    if (!tls) {
      throw new Error('https listener requires a certificate and key');
    }

    return https.createServer(
      {
        cert: readFileSync(tls.certificate),
        key: readFileSync(tls.key),
        ca: tls.authority ? readFileSync(tls.authority) : undefined,
      },
      requestListener
    );
  }
}

/**
 * Factory function
 */
export function createListener(options: ListenerOptions): Listener {
  return new NodeListener(options);
}
