/**
 * siteserve - Embeddable Site Server
 *
 * Main entry point.
 */

export {
  SiteServer,
  createSiteServer,
  createDefaultConfig,
  validateConfig,
  DEFAULT_SHUTDOWN_TIMEOUT,
  loadConfig,
  parseConfig,
  detectContentType,
  sniffContentType,
  readRequestBody,
  createListener,
  ShutdownManager,
  createShutdownManager,
  SiteServerError,
  StateError,
  ValidationError,
  SetupError,
  NotRunningError,
  ListenerError,
  ConfigLoadError,
  HttpError,
} from './site-server';
export type {
  ServerConfig,
  DiskRecord,
  RedirectRule,
  RouteHandler,
  Request,
  Response,
  ServerState,
  ServerEvent,
  ListenerAddress,
  Listener,
  ListenerFactory,
  ListenerOptions,
  SiteServerDependencies,
  Logger,
  LogEntry,
} from './site-server';

// Version
export const VERSION = '1.0.0';
