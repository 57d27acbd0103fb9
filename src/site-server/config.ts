/**
 * Server Configuration
 *
 * Defaults and validation for ServerConfig
 */

import { statSync } from 'fs';
import type { Stats } from 'fs';
import type { ServerConfig } from './types';
import { ValidationError } from './types';

export const DEFAULT_SHUTDOWN_TIMEOUT = 10_000;

/**
 * Reset-to-defaults initializer
 */
export function createDefaultConfig(): ServerConfig {
  return {
    host: '',
    http: { enabled: false, port: 80 },
    https: { enabled: false, port: 443, certificate: '', key: '', authority: '' },
    documentRoot: '',
    directories: [],
    files: [],
    redirects: [],
    shutdownTimeout: DEFAULT_SHUTDOWN_TIMEOUT,
    logging: { requests: false, errors: true },
  };
}

function statOrNull(filePath: string): Stats | null {
  try {
    return statSync(filePath);
  } catch {
    return null;
  }
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= 65535;
}

/**
 * Validate a configuration, throwing a ValidationError describing the first problem
 */
export function validateConfig(config: ServerConfig): void {
  if (!config.http.enabled && !config.https.enabled) {
    throw new ValidationError('neither https or http servers are enabled; we have nothing to do');
  }

  if (config.http.enabled && !isValidPort(config.http.port)) {
    throw new ValidationError(`invalid http port ${config.http.port}`);
  }

  if (config.https.enabled) {
    if (!config.https.certificate || !config.https.key) {
      throw new ValidationError('a certificate and key file must be provided if https is enabled');
    }
    if (!isValidPort(config.https.port)) {
      throw new ValidationError(`invalid https port ${config.https.port}`);
    }
  }

  if (config.documentRoot) {
    let stats: Stats;
    try {
      stats = statSync(config.documentRoot);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`invalid DocumentRoot ${config.documentRoot}: ${reason}`);
    }
    if (!stats.isDirectory()) {
      throw new ValidationError(`invalid DocumentRoot ${config.documentRoot}: not a directory`);
    }
  }

  for (const directory of config.directories) {
    if (!directory.webPath.startsWith('/')) {
      throw new ValidationError(`served directory web path must start with "/": ${directory.webPath}`);
    }
    const stats = statOrNull(directory.filePath);
    if (!stats) {
      throw new ValidationError(`error reading served directory: ${directory.filePath}`);
    }
    if (!stats.isDirectory()) {
      throw new ValidationError(`attempted to serve file ${directory.filePath} as a directory`);
    }
  }

  for (const file of config.files) {
    if (!file.webPath.startsWith('/')) {
      throw new ValidationError(`served file web path must start with "/": ${file.webPath}`);
    }
    const stats = statOrNull(file.filePath);
    if (!stats) {
      throw new ValidationError(`error reading served file: ${file.filePath}`);
    }
    if (stats.isDirectory()) {
      throw new ValidationError(`attempted to serve directory ${file.filePath} as a file`);
    }
  }

  for (const redirect of config.redirects) {
    if (!redirect.path.startsWith('/')) {
      throw new ValidationError(`redirect path must start with "/": ${redirect.path}`);
    }
    if (!Number.isInteger(redirect.code) || redirect.code < 300 || redirect.code > 399) {
      throw new ValidationError(`redirect ${redirect.path} has a non-redirection status code`);
    }
  }

  if (!Number.isFinite(config.shutdownTimeout) || config.shutdownTimeout < 0) {
    throw new ValidationError(`invalid shutdown timeout ${config.shutdownTimeout}`);
  }
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Detached, frozen copy of a configuration
 */
export function freezeConfig(config: ServerConfig): Readonly<ServerConfig> {
  return deepFreeze(structuredClone(config));
}
