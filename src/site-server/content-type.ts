/**
 * Content Type Detection
 *
 * Detects the MIME type of served content using:
 * 1. Magic bytes over the first 512 bytes (content sniffing)
 * 2. File extension (directory trees only)
 */

import path from 'path';
import { open } from 'fs/promises';
import signatureTable from './sniff-signatures.json';

export const SNIFF_LENGTH = 512;
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

// ============================================================================
// Signatures
// ============================================================================

interface ByteSignature {
  pattern: Buffer;
  mask: Buffer | null;
  skipWhitespace: boolean;
  mimeType: string;
}

const HTML_TAGS: Buffer[] = signatureTable.html.map((tag) => Buffer.from(tag, 'latin1'));

const SIGNATURES: ByteSignature[] = signatureTable.signatures.map((entry) => ({
  pattern: Buffer.from(entry.pattern, 'hex'),
  mask: 'mask' in entry && typeof entry.mask === 'string' ? Buffer.from(entry.mask, 'hex') : null,
  skipWhitespace: 'skipWhitespace' in entry && entry.skipWhitespace === true,
  mimeType: entry.mimeType,
}));

/**
 * Extension mapping for files served out of directory trees
 */
const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.json': 'application/json',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.webp': 'image/webp',
  '.txt': 'text/plain; charset=utf-8',
  '.xml': 'text/xml; charset=utf-8',
  '.pdf': 'application/pdf',
  '.wasm': 'application/wasm',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
};

// ============================================================================
// Matching
// ============================================================================

function isWhitespace(byte: number): boolean {
  return byte === 0x09 || byte === 0x0a || byte === 0x0c || byte === 0x0d || byte === 0x20;
}

function isTagTerminator(byte: number): boolean {
  return byte === 0x20 || byte === 0x3e;
}

function isBinaryByte(byte: number): boolean {
  return byte <= 0x08 || byte === 0x0b || (byte >= 0x0e && byte <= 0x1a) || (byte >= 0x1c && byte <= 0x1f);
}

function skipWhitespace(data: Buffer): Buffer {
  let start = 0;
  while (start < data.length && isWhitespace(data[start])) {
    start += 1;
  }
  return data.subarray(start);
}

function matchesHtmlTag(data: Buffer, tag: Buffer): boolean {
  if (data.length < tag.length + 1) {
    return false;
  }

  for (let i = 0; i < tag.length; i++) {
    let byte = data[i];
    // Tags are matched case-insensitively on their letters
    if (tag[i] >= 0x41 && tag[i] <= 0x5a) {
      byte &= 0xdf;
    }
    if (byte !== tag[i]) {
      return false;
    }
  }

  return isTagTerminator(data[tag.length]);
}

function matchesSignature(data: Buffer, sig: ByteSignature): boolean {
  const input = sig.skipWhitespace ? skipWhitespace(data) : data;
  if (input.length < sig.pattern.length) {
    return false;
  }

  for (let i = 0; i < sig.pattern.length; i++) {
    const mask = sig.mask ? sig.mask[i] : 0xff;
    if ((input[i] & mask) !== sig.pattern[i]) {
      return false;
    }
  }

  return true;
}

function isMP4(data: Buffer): boolean {
  if (data.length < 12) {
    return false;
  }

  const boxSize = data.readUInt32BE(0);
  if (data.length < boxSize || boxSize % 4 !== 0) {
    return false;
  }
  if (data.toString('latin1', 4, 8) !== 'ftyp') {
    return false;
  }

  for (let offset = 8; offset < boxSize; offset += 4) {
    if (offset === 12) {
      // minor version number
      continue;
    }
    if (data.toString('latin1', offset, offset + 3) === 'mp4') {
      return true;
    }
  }

  return false;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Sniff the content type of a buffer. Only the first 512 bytes are considered;
 * content that matches nothing and contains binary bytes is application/octet-stream.
 */
export function sniffContentType(buffer: Buffer): string {
  const data = buffer.subarray(0, SNIFF_LENGTH);

  const trimmed = skipWhitespace(data);
  for (const tag of HTML_TAGS) {
    if (matchesHtmlTag(trimmed, tag)) {
      return HTML_CONTENT_TYPE;
    }
  }

  for (const sig of SIGNATURES) {
    if (matchesSignature(data, sig)) {
      return sig.mimeType;
    }
  }

  if (isMP4(data)) {
    return 'video/mp4';
  }

  if (!data.some(isBinaryByte)) {
    return TEXT_CONTENT_TYPE;
  }

  return DEFAULT_CONTENT_TYPE;
}

/**
 * Detect the content type of a file from its first 512 bytes.
 * Rejects only when the file cannot be read.
 */
export async function detectContentType(filePath: string): Promise<string> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_LENGTH);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_LENGTH, 0);
    return sniffContentType(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

/**
 * Content type from the file extension, or null when the extension is unknown
 */
export function contentTypeFromExtension(filename: string): string | null {
  const ext = path.extname(filename).toLowerCase();
  return MIME_TYPES[ext] ?? null;
}
