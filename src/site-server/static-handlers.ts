/**
 * Static Content Handlers
 *
 * Route handlers for mapped files, mapped directory trees, the document root
 * and redirects
 */

import path from 'path';
import crypto from 'crypto';
import { createReadStream, readFileSync, statSync } from 'fs';
import type { Stats } from 'fs';
import { readFile, stat } from 'fs/promises';
import type { DiskRecord, RedirectRule, Request, Response, RouteHandler } from './types';
import { SetupError } from './types';
import { DEFAULT_CONTENT_TYPE, contentTypeFromExtension, detectContentType, sniffContentType } from './content-type';
import { sendStatus } from './request-response';

const INDEX_FILE = 'index.html';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Generate ETag from file stats
 */
function generateETag(stats: { size: number; mtimeMs: number }): string {
  const hash = crypto.createHash('md5');
  hash.update(`${stats.size}-${stats.mtimeMs}`);
  return `"${hash.digest('hex')}"`;
}

/**
 * Resolve a request path under a root, refusing anything that escapes it
 */
export function resolveSafeFilePath(requestPath: string, rootPath: string): string | null {
  const rel = requestPath.replace(/^\/+/, '');
  const resolved = path.resolve(rootPath, rel);

  const rootWithSep = rootPath.endsWith(path.sep) ? rootPath : rootPath + path.sep;
  if (resolved === rootPath || resolved.startsWith(rootWithSep)) {
    return resolved;
  }

  return null;
}

function sendBuffer(res: Response, contentType: string, body: Buffer): void {
  res.status(200).header('Content-Type', contentType).header('Content-Length', body.length).send(body);
}

// ============================================================================
// Mapped files
// ============================================================================

export interface StaticFile {
  contentType: string;
  size: number;
  body: Buffer;
}

/**
 * Read a mapped file completely. The bytes are held for the lifetime of the
 * route table, so later changes on disk are not served.
 */
export function loadStaticFile(filePath: string, contentType?: string): StaticFile {
  let stats: Stats;
  try {
    stats = statSync(filePath);
  } catch (error) {
    throw new SetupError(`unable to serve document ${filePath}: ${describe(error)}`);
  }

  if (stats.isDirectory()) {
    throw new SetupError(`unable to serve document ${filePath}: is a directory`);
  }
  if (stats.size === 0) {
    throw new SetupError(`unable to serve document ${filePath}: zero length file`);
  }

  let body: Buffer;
  try {
    body = readFileSync(filePath);
  } catch (error) {
    throw new SetupError(`could not open file ${filePath} for serving: ${describe(error)}`);
  }

  if (body.length !== stats.size) {
    throw new SetupError(`short read on ${filePath}: expected ${stats.size} bytes, got ${body.length}`);
  }

  return {
    contentType: contentType || sniffContentType(body),
    size: stats.size,
    body,
  };
}

export function createFileHandler(record: DiskRecord): RouteHandler {
  const file = loadStaticFile(record.filePath, record.contentType);

  return (_req: Request, res: Response) => {
    sendBuffer(res, file.contentType, file.body);
  };
}

// ============================================================================
// Document root
// ============================================================================

/**
 * Catch-all handler resolving every request against the document root. Files are
 * read per request; directories are never listed.
 */
export function createDocumentRootHandler(documentRoot: string): RouteHandler {
  const rootPath = path.resolve(documentRoot);

  return async (req: Request, res: Response) => {
    let requestPath: string;
    try {
      requestPath = decodeURIComponent(req.path);
    } catch {
      sendStatus(res, 400);
      return;
    }

    if (requestPath.endsWith('/')) {
      requestPath += INDEX_FILE;
    }

    const filePath = resolveSafeFilePath(path.posix.normalize(requestPath), rootPath);
    if (!filePath) {
      sendStatus(res, 404);
      return;
    }

    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (error) {
      sendStatus(res, isNotFound(error) ? 404 : 500);
      return;
    }

    if (stats.isDirectory() || stats.size === 0) {
      sendStatus(res, 404);
      return;
    }

    let body: Buffer;
    try {
      body = await readFile(filePath);
    } catch (error) {
      sendStatus(res, isNotFound(error) ? 404 : 500);
      return;
    }

    if (body.length !== stats.size) {
      sendStatus(res, 500);
      return;
    }

    sendBuffer(res, sniffContentType(body), body);
  };
}

// ============================================================================
// Mapped directories
// ============================================================================

/**
 * Subtree pattern a directory is mounted on
 */
export function directoryPattern(webPath: string): string {
  return webPath.endsWith('/') ? webPath : `${webPath}/`;
}

/**
 * Serve a directory tree mounted at `record.webPath`
 */
export function createDirectoryHandler(record: DiskRecord): RouteHandler {
  const rootPath = path.resolve(record.filePath);
  const mount = directoryPattern(record.webPath);

  return async (req: Request, res: Response) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.header('Allow', 'GET, HEAD');
      sendStatus(res, 405);
      return;
    }

    let requestPath: string;
    try {
      requestPath = decodeURIComponent(req.path);
    } catch {
      sendStatus(res, 400);
      return;
    }

    const relative = requestPath.startsWith(mount) ? requestPath.slice(mount.length) : '';
    const resolvedPath = resolveSafeFilePath(relative, rootPath);
    if (!resolvedPath) {
      sendStatus(res, 403);
      return;
    }

    let filePath = resolvedPath;
    let fileStats: Stats;
    try {
      fileStats = await stat(filePath);
      if (fileStats.isDirectory()) {
        filePath = path.join(filePath, INDEX_FILE);
        fileStats = await stat(filePath);
      }
    } catch (error) {
      sendStatus(res, isNotFound(error) ? 404 : 500);
      return;
    }

    if (!fileStats.isFile()) {
      sendStatus(res, 404);
      return;
    }

    const etag = generateETag(fileStats);
    if (req.getHeader('if-none-match') === etag) {
      res.status(304).header('ETag', etag).send();
      return;
    }

    let contentType = record.contentType || contentTypeFromExtension(filePath);
    if (!contentType) {
      try {
        contentType = await detectContentType(filePath);
      } catch {
        contentType = DEFAULT_CONTENT_TYPE;
      }
    }

    res.header('Content-Type', contentType);
    res.header('Content-Length', fileStats.size);
    res.header('ETag', etag);
    res.header('Last-Modified', fileStats.mtime.toUTCString());

    if (req.method === 'HEAD') {
      res.status(200).send();
      return;
    }

    res.status(200).stream(createReadStream(filePath));
  };
}

// ============================================================================
// Redirects
// ============================================================================

export function createRedirectHandler(rule: RedirectRule): RouteHandler {
  return (_req: Request, res: Response) => {
    res.redirect(rule.newPath, rule.code);
  };
}
