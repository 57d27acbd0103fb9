/**
 * Request and Response Objects
 *
 * Convenient wrappers around IncomingMessage and ServerResponse
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { Readable } from 'stream';
import { STATUS_CODES } from 'http';
import type { Request as RequestType, Response as ResponseType } from './types';
import { HttpError } from './types';

export const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024;

/**
 * Parse query string
 */
export function parseQueryString(queryString: string): Record<string, string> {
  const params: Record<string, string> = {};

  if (!queryString) {
    return params;
  }

  for (const [key, value] of new URLSearchParams(queryString)) {
    if (key) {
      params[key] = value;
    }
  }

  return params;
}

/**
 * Read the complete body of a request
 */
export function readRequestBody(req: IncomingMessage, maxSize: number = DEFAULT_MAX_BODY_SIZE): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;

    req.on('data', (chunk: Buffer) => {
      if (overflowed) {
        // keep draining so the response can still be written
        return;
      }

      size += chunk.length;
      if (size > maxSize) {
        overflowed = true;
        chunks.length = 0;
        reject(new HttpError(413, 'Request body too large'));
        return;
      }

      chunks.push(chunk);
    });

    req.on('end', () => {
      resolve(Buffer.concat(chunks));
    });

    req.on('error', reject);
  });
}

/**
 * Request wrapper
 */
export class Request implements RequestType {
  method: string;
  path: string;
  search: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  raw: IncomingMessage;

  private bodyPromise: Promise<Buffer> | null = null;

  constructor(req: IncomingMessage) {
    this.raw = req;
    this.method = req.method?.toUpperCase() || 'GET';

    // Split the request target; the path is routed exactly as sent
    const target = req.url || '/';
    const queryIndex = target.indexOf('?');
    this.path = queryIndex === -1 ? target : target.slice(0, queryIndex);
    const rawQuery = queryIndex === -1 ? '' : target.slice(queryIndex + 1);
    this.search = rawQuery ? `?${rawQuery}` : '';
    this.query = parseQueryString(rawQuery);

    // Headers (case-insensitive)
    this.headers = {};
    for (const [key, value] of Object.entries(req.headers)) {
      if (typeof value === 'string') {
        this.headers[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        this.headers[key.toLowerCase()] = value[0] || '';
      }
    }
  }

  /**
   * Get header (case-insensitive)
   */
  getHeader(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  /**
   * Buffer the request body; repeated calls share one read
   */
  readBody(maxSize?: number): Promise<Buffer> {
    if (!this.bodyPromise) {
      this.bodyPromise = readRequestBody(this.raw, maxSize);
    }
    return this.bodyPromise;
  }
}

/**
 * Response wrapper
 */
export class Response implements ResponseType {
  private _sent = false;
  private _statusCode = 200;
  private _headers: Record<string, string | number> = {};
  raw: ServerResponse;

  constructor(res: ServerResponse) {
    this.raw = res;
  }

  get sent(): boolean {
    return this._sent;
  }

  /**
   * Set status code
   */
  status(code: number): this {
    if (this._sent) {
      throw new Error('Response already sent');
    }
    this._statusCode = code;
    return this;
  }

  /**
   * Set header
   */
  header(name: string, value: string | number): this {
    if (this._sent) {
      throw new Error('Response already sent');
    }
    this._headers[name] = value;
    return this;
  }

  /**
   * Send JSON response
   */
  json(data: unknown): void {
    this.header('Content-Type', 'application/json');
    this.send(JSON.stringify(data));
  }

  /**
   * Send text response
   */
  text(data: string): void {
    this.header('Content-Type', 'text/plain; charset=utf-8');
    this.send(data);
  }

  /**
   * Redirect
   */
  redirect(url: string, code: number = 302): void {
    this.status(code);
    this.header('Location', url);
    this.send();
  }

  /**
   * Stream response
   */
  stream(readable: Readable): void {
    if (this._sent) {
      throw new Error('Response already sent');
    }

    this._sent = true;
    this.writeHead();
    readable.on('error', () => {
      this.raw.destroy();
    });
    readable.pipe(this.raw);
  }

  /**
   * Send response
   */
  send(body?: string | Buffer): void {
    if (this._sent) {
      throw new Error('Response already sent');
    }

    this._sent = true;
    if (this.raw.headersSent) {
      if (!this.raw.writableEnded) {
        this.raw.end(body);
      }
      return;
    }

    this.writeHead();

    if (body !== undefined) {
      this.raw.end(body);
    } else {
      this.raw.end();
    }
  }

  /**
   * Write headers
   */
  private writeHead(): void {
    if (this.raw.headersSent) {
      return;
    }
    this.raw.writeHead(this._statusCode, this._headers);
  }
}

/**
 * Plain-text status response ("404 page not found", "Internal Server Error", ...)
 */
export function sendStatus(res: ResponseType, statusCode: number, body?: string): void {
  const text = body ?? (statusCode === 404 ? '404 page not found' : STATUS_CODES[statusCode] ?? 'Error');
  res.status(statusCode).header('X-Content-Type-Options', 'nosniff').text(`${text}\n`);
}

/**
 * Create Request from IncomingMessage
 */
export function createRequest(req: IncomingMessage): Request {
  return new Request(req);
}

/**
 * Create Response from ServerResponse
 */
export function createResponse(res: ServerResponse): Response {
  return new Response(res);
}
