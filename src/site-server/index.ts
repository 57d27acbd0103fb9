/**
 * Site Server Module
 */

export { SiteServer, createSiteServer } from './SiteServer';
export { createDefaultConfig, validateConfig, DEFAULT_SHUTDOWN_TIMEOUT } from './config';
export { loadConfig, parseConfig } from './config-loader';
export { detectContentType, sniffContentType } from './content-type';
export { readRequestBody } from './request-response';
export { createListener } from './listener';
export { ShutdownManager, createShutdownManager } from './shutdown-manager';
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
} from './types';
export {
  SiteServerError,
  StateError,
  ValidationError,
  SetupError,
  NotRunningError,
  ListenerError,
  ConfigLoadError,
  HttpError,
} from './types';
