/**
 * Route Builder
 *
 * Compiles configuration and registered handlers into a RouteTable
 */

import type { RouteHandler, ServerConfig } from './types';
import { RouteTable, RouteTableBuilder } from './route-table';
import {
  createDirectoryHandler,
  createDocumentRootHandler,
  createFileHandler,
  createRedirectHandler,
  directoryPattern,
} from './static-handlers';

/**
 * Build the route table in fixed precedence: custom handlers, redirects, mapped
 * files, mapped directories, then the document root catch-all. A pattern bound
 * twice is a ValidationError; an unusable mapped file is a SetupError.
 */
export function buildRouteTable(
  config: Readonly<ServerConfig>,
  handlers: ReadonlyMap<string, RouteHandler>
): RouteTable {
  const builder = new RouteTableBuilder();

  for (const [pattern, handler] of handlers) {
    builder.add(pattern, 'handler', handler);
  }

  for (const redirect of config.redirects) {
    builder.add(redirect.path, 'redirect', createRedirectHandler(redirect));
  }

  for (const record of config.files) {
    builder.add(record.webPath, 'file', createFileHandler(record));
  }

  for (const record of config.directories) {
    builder.add(directoryPattern(record.webPath), 'directory', createDirectoryHandler(record));
  }

  if (config.documentRoot) {
    builder.add('/', 'document-root', createDocumentRootHandler(config.documentRoot));
  }

  return builder.build();
}
