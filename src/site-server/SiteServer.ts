/**
 * Site Server
 *
 * Lifecycle controller for up to two listeners (plain and TLS) sharing one
 * route table: configure -> finalize -> start -> stop / wait.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type {
  Listener,
  ListenerAddress,
  ListenerFactory,
  LogEntry,
  LogLevel,
  Logger,
  RouteBinding,
  RouteHandler,
  ServerConfig,
  ServerEvent,
  ServerEventMap,
  ServerState,
  SiteServerDependencies,
  Transport,
} from './types';
import { HttpError, ListenerError, NotRunningError, SetupError, StateError, ValidationError } from './types';
import { createDefaultConfig, freezeConfig, validateConfig } from './config';
import { lifecycle } from './lifecycle';
import { createListener } from './listener';
import { buildRouteTable } from './route-builder';
import type { RouteTable } from './route-table';
import { createRequest, createResponse, sendStatus } from './request-response';

type ServerEventHandler<K extends ServerEvent> = (...args: ServerEventMap[K]) => void;

type EventHandlers = { [K in ServerEvent]: Set<ServerEventHandler<K>> };

interface ActiveRun {
  listeners: Listener[];
  /** Settles with every bound address, or the first listener failure */
  listening: Promise<ListenerAddress[]>;
  /** Fires once every listener task has finished */
  completion: Promise<void>;
}

class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SiteServer {
  private state: ServerState = 'unconfigured';
  private config: Readonly<ServerConfig> = freezeConfig(createDefaultConfig());
  private handlers = new Map<string, RouteHandler>();
  private routes: RouteTable | null = null;
  private activeRun: ActiveRun | null = null;
  /** Runs released by a non-blocking stop whose listeners are still closing */
  private drainingRuns = new Set<ActiveRun>();

  private readonly createListener: ListenerFactory;
  private readonly logger: Logger;

  private readonly events: EventHandlers = {
    start: new Set(),
    listening: new Set(),
    stop: new Set(),
    fatal: new Set(),
    error: new Set(),
  };

  private readonly logBuffer: LogEntry[] = [];
  private readonly maxLogBufferSize = 500;

  constructor(deps: SiteServerDependencies = {}) {
    this.createListener = deps.createListener ?? createListener;
    this.logger = deps.logger ?? console;
  }

  // ------------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------------

  on<K extends ServerEvent>(event: K, handler: ServerEventHandler<K>): () => void {
    const set = this.events[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /**
   * Replace the configuration. Only allowed before finalize; handlers registered
   * against the previous configuration are discarded.
   */
  configure(config: ServerConfig): void {
    if (this.state === 'running') {
      throw new StateError('server is running; you must configure it before running');
    }
    if (lifecycle.isFinalized(this.state)) {
      throw new StateError('server configuration has been finalized; too late to reconfigure now');
    }

    validateConfig(config);

    this.config = freezeConfig(config);
    this.routes = null;
    this.activeRun = null;
    this.handlers = new Map();
    this.setState('configured');
  }

  /**
   * Bind a handler to a pattern. A pattern ending in "/" also handles every path
   * beneath it that nothing more specific claims.
   */
  registerHandler(pattern: string, handler: RouteHandler): void {
    if (typeof handler !== 'function') {
      throw new ValidationError('refusing to register a nil handler');
    }
    if (this.state === 'running') {
      throw new StateError('server is already running; handlers can only be added when stopped');
    }
    if (lifecycle.isFinalized(this.state)) {
      throw new StateError('server configuration has been finalized; too late to reconfigure anything now');
    }

    try {
      validateConfig(this.config);
    } catch (error) {
      throw new ValidationError(`server is not correctly configured: ${describeError(error)}`);
    }

    if (pattern === '/' && this.config.documentRoot) {
      throw new ValidationError('cannot register a root handler with a DocumentRoot specified');
    }
    if (!pattern.startsWith('/')) {
      throw new ValidationError(`handler pattern must start with "/": ${pattern}`);
    }
    if (this.handlers.has(pattern)) {
      throw new ValidationError('a handler already is registered at that path');
    }

    this.handlers.set(pattern, handler);
  }

  /**
   * Lock in the configuration and build the route table
   */
  finalize(): void {
    this.compileRoutes();
  }

  /**
   * Spawn one listener task per enabled transport. Returns before the sockets are
   * bound; use whenListening() to wait for them.
   */
  start(): void {
    if (this.state === 'running') {
      throw new StateError('server is already running');
    }

    const routes = this.routes && lifecycle.isFinalized(this.state) ? this.routes : this.compileRoutes();

    this.activeRun = this.spawn(this.config, routes);
    this.setState('running');
    this.log('info', 'server started', { listeners: this.activeRun.listeners.map((l) => l.transport) });
    this.emit('start');
  }

  /**
   * Request graceful shutdown of every listener. Non-blocking calls return once
   * shutdown is requested; blocking calls return after every listener has stopped.
   */
  async stop(blocking: boolean = false): Promise<void> {
    const run = this.activeRun;
    if (this.state !== 'running' || !run) {
      return;
    }

    const timeout = this.config.shutdownTimeout;
    const requests = run.listeners.map((listener) => this.requestShutdown(listener, timeout));

    if (!blocking) {
      this.activeRun = null;
      this.drainingRuns.add(run);
      this.setState('stopped');
      void Promise.allSettled(requests).then((results) => {
        for (const error of this.shutdownFailures(results)) {
          this.emit('error', error);
        }
      });
      return;
    }

    // The first failure is held until the other listener's drain settles
    const failures = this.shutdownFailures(await Promise.allSettled(requests));
    if (failures.length > 0) {
      throw failures[0];
    }

    await run.completion;
  }

  /**
   * Resolve once every listener of the current run has stopped
   */
  async wait(): Promise<void> {
    const run = this.activeRun;
    if (this.state !== 'running' || !run) {
      throw new NotRunningError();
    }

    await run.completion;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getState(): ServerState {
    return this.state;
  }

  getConfig(): Readonly<ServerConfig> {
    return this.config;
  }

  getRoutes(): readonly RouteBinding[] {
    return this.routes?.getRoutes() ?? [];
  }

  /**
   * Addresses bound by the current run
   */
  addresses(): ListenerAddress[] {
    const addresses: ListenerAddress[] = [];
    for (const listener of this.activeRun?.listeners ?? []) {
      const address = listener.address();
      if (address) addresses.push(address);
    }
    return addresses;
  }

  /**
   * Resolve once every listener of the current run is bound
   */
  whenListening(): Promise<ListenerAddress[]> {
    const run = this.activeRun;
    if (this.state !== 'running' || !run) {
      return Promise.reject(new NotRunningError());
    }
    return run.listening;
  }

  getLogs(limit: number = 100): LogEntry[] {
    return this.logBuffer.slice(Math.max(0, this.logBuffer.length - limit));
  }

  // ------------------------------------------------------------------------
  // Lifecycle internals
  // ------------------------------------------------------------------------

  private setState(next: ServerState): void {
    this.state = lifecycle.transition(this.state, next);
  }

  private compileRoutes(): RouteTable {
    if (lifecycle.isFinalized(this.state)) {
      throw new StateError('server configuration was already finalized');
    }

    try {
      validateConfig(this.config);
    } catch (error) {
      throw new ValidationError(`configuration error: ${describeError(error)}`);
    }

    let routes: RouteTable;
    try {
      routes = buildRouteTable(this.config, this.handlers);
    } catch (error) {
      if (error instanceof SetupError) {
        throw new SetupError(`setup failure: ${error.message}`, error.details);
      }
      throw error;
    }

    this.routes = routes;
    this.setState('finalized');
    this.log('info', 'configuration finalized', { routes: routes.size });
    return routes;
  }

  private spawn(config: Readonly<ServerConfig>, routes: RouteTable): ActiveRun {
    const transports: Transport[] = [];
    if (config.http.enabled) transports.push('http');
    if (config.https.enabled) transports.push('https');

    const handler = (req: IncomingMessage, res: ServerResponse) => this.handleRequest(routes, req, res);

    const listeners: Listener[] = [];
    const tasks: Promise<void>[] = [];
    const bound: Promise<ListenerAddress>[] = [];

    for (const transport of transports) {
      const ready = new Deferred<ListenerAddress>();
      const listener = this.createListener({
        transport,
        host: config.host,
        port: transport === 'http' ? config.http.port : config.https.port,
        tls:
          transport === 'https'
            ? { certificate: config.https.certificate, key: config.https.key, authority: config.https.authority || undefined }
            : undefined,
        handler,
        onListening: (address) => {
          ready.resolve(address);
          this.log('info', `${address.transport} listener bound`, address);
          this.emit('listening', address);
        },
      });

      listeners.push(listener);
      bound.push(ready.promise);
      tasks.push(
        listener.run().then(
          () => {
            ready.reject(new NotRunningError(`${transport} listener closed before it was bound`));
          },
          (error: unknown) => {
            const failure = error instanceof ListenerError ? error : new ListenerError(transport, error);
            ready.reject(failure);
            this.reportFatal(failure);
          }
        )
      );
    }

    const listening = Promise.all(bound);
    // Observed through whenListening(); a failure is reported as a fatal event
    listening.catch(() => undefined);

    const run: ActiveRun = { listeners, listening, completion: Promise.resolve() };
    run.completion = Promise.all(tasks).then(() => this.finishRun(run));
    return run;
  }

  private finishRun(run: ActiveRun): void {
    if (this.drainingRuns.delete(run)) {
      this.log('info', 'previous run drained');
      this.emit('stop');
      return;
    }
    if (this.activeRun !== run) {
      return;
    }

    this.activeRun = null;
    if (this.state === 'running') {
      this.setState('stopped');
    }
    this.log('info', 'all listeners stopped');
    this.emit('stop');
  }

  private requestShutdown(listener: Listener, timeout: number): Promise<void> {
    try {
      return listener.shutdown(timeout);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private shutdownFailures(results: PromiseSettledResult<void>[]): Error[] {
    const failures: Error[] = [];
    for (const result of results) {
      if (result.status === 'rejected') {
        const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
        this.log('error', `listener shutdown failed: ${error.message}`);
        failures.push(error);
      }
    }
    return failures;
  }

  private reportFatal(error: ListenerError): void {
    this.log('error', error.message, { transport: error.transport });
    this.emit('fatal', error);
  }

  // ------------------------------------------------------------------------
  // Request dispatch
  // ------------------------------------------------------------------------

  private async handleRequest(routes: RouteTable, rawReq: IncomingMessage, rawRes: ServerResponse): Promise<void> {
    const startedAt = Date.now();
    const res = createResponse(rawRes);

    try {
      const req = createRequest(rawReq);
      const match = routes.match(req.path);

      if (match.kind === 'redirect') {
        res.redirect(`${match.location}${req.search}`, 301);
      } else if (match.kind === 'none') {
        sendStatus(res, 404);
      } else {
        await Promise.resolve(match.binding.handler(req, res));
        if (!res.sent && !rawRes.headersSent) {
          res.status(200).send();
        }
      }

      if (this.config.logging.requests) {
        this.log('info', `${req.method} ${req.path} -> ${rawRes.statusCode} (${Date.now() - startedAt}ms)`);
      }
    } catch (error) {
      const statusCode = error instanceof HttpError ? error.statusCode : 500;

      if (this.config.logging.errors && statusCode >= 500) {
        this.log('error', `request error: ${describeError(error)}`, { url: rawReq.url });
      }
      if (statusCode >= 500) {
        this.emit('error', error instanceof Error ? error : new Error(String(error)));
      }

      if (res.sent || rawRes.headersSent) {
        if (!rawRes.writableEnded) {
          rawRes.end();
        }
        return;
      }

      sendStatus(res, statusCode, error instanceof HttpError && statusCode < 500 ? error.message : undefined);
    }
  }

  // ------------------------------------------------------------------------
  // Events & logging
  // ------------------------------------------------------------------------

  private emit<K extends ServerEvent>(event: K, ...args: ServerEventMap[K]): void {
    for (const handler of this.events[event]) {
      try {
        handler(...args);
      } catch (error) {
        this.log('error', `${event} handler failed: ${describeError(error)}`);
      }
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    this.logBuffer.push({ ts: Date.now(), level, message, data });
    if (this.logBuffer.length > this.maxLogBufferSize) {
      this.logBuffer.splice(0, this.logBuffer.length - this.maxLogBufferSize);
    }

    if (data === undefined) {
      this.logger[level](`[siteserve] ${message}`);
    } else {
      this.logger[level](`[siteserve] ${message}`, data);
    }
  }
}

/**
 * Factory function
 */
export function createSiteServer(deps?: SiteServerDependencies): SiteServer {
  return new SiteServer(deps);
}
