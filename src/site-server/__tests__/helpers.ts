/**
 * Shared test helpers: in-process listener stand-in, HTTP client and temp trees
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import http from 'http';
import https from 'https';
import type { Listener, ListenerAddress, ListenerFactory, ListenerOptions, Logger, ServerConfig, Transport } from '../types';
import { createDefaultConfig } from '../config';

// ============================================================================
// Listener stand-in
// ============================================================================

/**
 * Listener whose lifetime is driven by the test: bind(), finish() and fail()
 * stand in for the socket becoming ready, closing and erroring.
 */
export class FakeListener implements Listener {
  readonly transport: Transport;
  readonly options: ListenerOptions;

  shutdownCalls: number[] = [];
  /** When set, shutdown() resolves but the task keeps running until finish() */
  holdShutdown = false;
  /** When set, shutdown() rejects with this error */
  shutdownError: Error | null = null;

  private bound: ListenerAddress | null = null;
  private settle: { resolve: () => void; reject: (error: unknown) => void } = {
    resolve: () => undefined,
    reject: () => undefined,
  };
  private readonly done: Promise<void>;

  constructor(options: ListenerOptions) {
    this.transport = options.transport;
    this.options = options;
    this.done = new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
  }

  run(): Promise<void> {
    return this.done;
  }

  bind(port: number = 8000): ListenerAddress {
    this.bound = { transport: this.transport, host: '127.0.0.1', port };
    this.options.onListening?.(this.bound);
    return this.bound;
  }

  finish(): void {
    this.bound = null;
    this.settle.resolve();
  }

  fail(error: Error): void {
    this.bound = null;
    this.settle.reject(error);
  }

  shutdown(timeout: number): Promise<void> {
    this.shutdownCalls.push(timeout);
    if (this.shutdownError) {
      return Promise.reject(this.shutdownError);
    }
    if (!this.holdShutdown) {
      this.finish();
    }
    return Promise.resolve();
  }

  address(): ListenerAddress | null {
    return this.bound;
  }
}

export function fakeListenerFactory(): { created: FakeListener[]; factory: ListenerFactory } {
  const created: FakeListener[] = [];
  const factory: ListenerFactory = (options) => {
    const listener = new FakeListener(options);
    created.push(listener);
    return listener;
  };
  return { created, factory };
}

// ============================================================================
// Configuration & logging
// ============================================================================

export function silentLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Plain listener on an ephemeral loopback port
 */
export function httpConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const config = createDefaultConfig();
  config.host = '127.0.0.1';
  config.http = { enabled: true, port: 0 };
  return { ...config, ...overrides };
}

/**
 * Plain and TLS listeners; certificate paths are only checked by the real listener
 */
export function dualConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const config = httpConfig(overrides);
  config.https = { enabled: true, port: 0, certificate: 'cert.pem', key: 'key.pem', authority: '' };
  return config;
}

/**
 * Let pending promise callbacks run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ============================================================================
// Temporary trees
// ============================================================================

export function makeTempDir(prefix: string = 'siteserve-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write files relative to root; a key ending in "/" creates an empty directory
 */
export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    if (rel.endsWith('/')) {
      fs.mkdirSync(target, { recursive: true });
      continue;
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

/**
 * Self-signed certificate and key generated for the tests (CN=localhost, 127.0.0.1)
 */
export const TLS_FIXTURES = {
  certificate: path.join(__dirname, 'fixtures', 'cert.pem'),
  key: path.join(__dirname, 'fixtures', 'key.pem'),
};

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// ============================================================================
// HTTP client
// ============================================================================

export interface HttpResult {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
  text: string;
}

export interface HttpRequestOptions {
  method?: string;
  headers?: http.OutgoingHttpHeaders;
  body?: string;
}

export function httpRequest(port: number, requestPath: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
  return send(http.request, port, requestPath, options);
}

/**
 * Request over TLS; the self-signed test certificate is accepted without verification
 */
export function httpsRequest(port: number, requestPath: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
  const request = (opts: https.RequestOptions, callback: (res: http.IncomingMessage) => void) =>
    https.request({ ...opts, rejectUnauthorized: false }, callback);
  return send(request, port, requestPath, options);
}

type RequestFn = (options: http.RequestOptions, callback: (res: http.IncomingMessage) => void) => http.ClientRequest;

function send(request: RequestFn, port: number, requestPath: string, options: HttpRequestOptions): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const req = request(
      {
        method: options.method ?? 'GET',
        host: '127.0.0.1',
        port,
        path: requestPath,
        headers: options.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (c) => chunks.push(Buffer.from(c)));
        res.on('end', () => {
          const body = Buffer.concat(chunks);
          resolve({ statusCode: res.statusCode || 0, headers: res.headers, body, text: body.toString('utf8') });
        });
        res.on('error', reject);
      }
    );

    req.on('error', reject);
    if (options.body !== undefined) {
      req.write(options.body);
    }
    req.end();
  });
}
