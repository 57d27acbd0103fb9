/**
 * Site Server Types
 *
 * Configuration, routing, listener and error types shared by the runtime
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { Readable } from 'stream';

// ============================================================================
// Server Configuration
// ============================================================================

export interface DiskRecord {
  /** Location within the site the path is served on */
  webPath: string;

  /** Path on disk */
  filePath: string;

  /** Overrides the detected content type */
  contentType?: string;
}

export interface RedirectRule {
  /** Path the redirect is served on */
  path: string;

  /** Location the client is sent to */
  newPath: string;

  /** 3xx status code */
  code: number;
}

export interface PlainListenerConfig {
  enabled: boolean;
  port: number;
}

export interface SecureListenerConfig {
  enabled: boolean;
  port: number;
  certificate: string;
  key: string;
  /** CA chain for the certificate (optional) */
  authority: string;
}

export interface LoggingConfig {
  requests: boolean;
  errors: boolean;
}

export interface ServerConfig {
  /** Bind address; empty binds every interface */
  host: string;

  http: PlainListenerConfig;
  https: SecureListenerConfig;

  /** Fallback directory for unmatched paths; empty disables it */
  documentRoot: string;

  directories: DiskRecord[];
  files: DiskRecord[];
  redirects: RedirectRule[];

  /** Grace period (ms) before open connections are closed on stop */
  shutdownTimeout: number;

  logging: LoggingConfig;
}

// ============================================================================
// HTTP Types
// ============================================================================

export interface Request {
  method: string;
  path: string;
  /** Raw query string including the leading "?", or empty */
  search: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  getHeader(name: string): string | undefined;
  readBody(maxSize?: number): Promise<Buffer>;
  raw: IncomingMessage;
}

export interface Response {
  status(code: number): this;
  header(name: string, value: string | number): this;
  json(data: unknown): void;
  text(data: string): void;
  redirect(url: string, code?: number): void;
  stream(readable: Readable): void;
  send(body?: string | Buffer): void;
  readonly sent: boolean;
  raw: ServerResponse;
}

export type RouteHandler = (req: Request, res: Response) => Promise<void> | void;

// ============================================================================
// Routing Types
// ============================================================================

export type RouteSource = 'handler' | 'redirect' | 'file' | 'directory' | 'document-root';

export interface RouteBinding {
  pattern: string;
  source: RouteSource;
  handler: RouteHandler;
}

export type RouteMatch =
  | { kind: 'route'; binding: RouteBinding }
  | { kind: 'redirect'; location: string }
  | { kind: 'none' };

// ============================================================================
// Listener Types
// ============================================================================

export type Transport = 'http' | 'https';

export interface ListenerAddress {
  transport: Transport;
  host: string;
  port: number;
}

export interface TLSMaterial {
  certificate: string;
  key: string;
  authority?: string;
}

export type RawRequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export interface ListenerOptions {
  transport: Transport;
  host: string;
  port: number;
  tls?: TLSMaterial;
  handler: RawRequestHandler;
  onListening?: (address: ListenerAddress) => void;
}

export interface Listener {
  readonly transport: Transport;

  /**
   * Serve until shut down. Resolves once the socket is closed after a shutdown
   * request; rejects with a ListenerError on any other bind or serve failure.
   */
  run(): Promise<void>;

  /**
   * Stop accepting connections and let in-flight requests finish. Connections still
   * open after `timeout` ms are closed.
   */
  shutdown(timeout: number): Promise<void>;

  address(): ListenerAddress | null;
}

export type ListenerFactory = (options: ListenerOptions) => Listener;

// ============================================================================
// Lifecycle Types
// ============================================================================

export type ServerState = 'unconfigured' | 'configured' | 'finalized' | 'running' | 'stopped';

export interface ServerEventMap {
  start: [];
  listening: [address: ListenerAddress];
  stop: [];
  fatal: [error: ListenerError];
  error: [error: Error];
}

export type ServerEvent = keyof ServerEventMap;

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: number;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export type Logger = Pick<Console, LogLevel>;

export interface SiteServerDependencies {
  /** Creates the listener for each enabled transport */
  createListener?: ListenerFactory;

  logger?: Logger;
}

// ============================================================================
// Error Types
// ============================================================================

export class SiteServerError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SiteServerError';
  }
}

/** Operation invoked in the wrong lifecycle state */
export class StateError extends SiteServerError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_STATE', details);
    this.name = 'StateError';
  }
}

export class ValidationError extends SiteServerError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/** A mapped file could not be loaded while building routes */
export class SetupError extends SiteServerError {
  constructor(message: string, details?: unknown) {
    super(message, 'SETUP_ERROR', details);
    this.name = 'SetupError';
  }
}

export class NotRunningError extends SiteServerError {
  constructor(message: string = 'server not running') {
    super(message, 'NOT_RUNNING');
    this.name = 'NotRunningError';
  }
}

export class ListenerError extends SiteServerError {
  constructor(
    public transport: Transport,
    public cause: unknown
  ) {
    super(
      `fatal ${transport} server error: ${cause instanceof Error ? cause.message : String(cause)}`,
      'LISTENER_FAILURE'
    );
    this.name = 'ListenerError';
  }
}

export class ConfigLoadError extends SiteServerError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_LOAD_ERROR', details);
    this.name = 'ConfigLoadError';
  }
}

/** Thrown from a route handler to answer with a specific status */
export class HttpError extends SiteServerError {
  constructor(
    public statusCode: number,
    message: string,
    details?: unknown
  ) {
    super(message, 'HTTP_ERROR', details);
    this.name = 'HttpError';
  }
}
