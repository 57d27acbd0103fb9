/**
 * Configuration Loader
 *
 * Reads a YAML configuration document into a ServerConfig. Only the document's
 * structure is checked here; validateConfig() owns the semantic rules.
 */

import { readFile, stat } from 'fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { DiskRecord, ServerConfig } from './types';
import { ConfigLoadError } from './types';
import { createDefaultConfig } from './config';

const portSchema = z.number().int().min(0).max(65535);

const diskRecordSchema = z.object({
  'web-path': z.string(),
  'file-path': z.string(),
  'content-type': z.string().optional(),
});

const redirectSchema = z.object({
  path: z.string(),
  'new-path': z.string(),
  code: z.number().int(),
});

const configDocumentSchema = z
  .object({
    host: z.string().optional(),
    http: z
      .object({
        enabled: z.boolean().optional(),
        port: portSchema.optional(),
      })
      .optional(),
    https: z
      .object({
        enabled: z.boolean().optional(),
        port: portSchema.optional(),
        certificate: z.string().optional(),
        key: z.string().optional(),
        authority: z.string().optional(),
      })
      .optional(),
    document_root: z.string().optional(),
    shutdown_timeout: z.number().nonnegative().optional(),
    logging: z
      .object({
        requests: z.boolean().optional(),
        errors: z.boolean().optional(),
      })
      .optional(),
    directories: z.array(diskRecordSchema).nullish(),
    files: z.array(diskRecordSchema).nullish(),
    redirects: z.array(redirectSchema).nullish(),
  })
  .strict();

type ConfigDocument = z.infer<typeof configDocumentSchema>;
type DiskRecordDocument = z.infer<typeof diskRecordSchema>;

function toDiskRecord(entry: DiskRecordDocument): DiskRecord {
  const record: DiskRecord = { webPath: entry['web-path'], filePath: entry['file-path'] };
  if (entry['content-type']) {
    record.contentType = entry['content-type'];
  }
  return record;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toServerConfig(doc: ConfigDocument): ServerConfig {
  const config = createDefaultConfig();

  config.host = doc.host ?? config.host;
  config.http = { ...config.http, ...doc.http };
  config.https = { ...config.https, ...doc.https };
  config.documentRoot = doc.document_root ?? config.documentRoot;
  config.shutdownTimeout = doc.shutdown_timeout ?? config.shutdownTimeout;
  config.logging = { ...config.logging, ...doc.logging };
  config.directories = (doc.directories ?? []).map(toDiskRecord);
  config.files = (doc.files ?? []).map(toDiskRecord);
  config.redirects = (doc.redirects ?? []).map((entry) => ({
    path: entry.path,
    newPath: entry['new-path'],
    code: entry.code,
  }));

  return config;
}

/**
 * Parse a YAML configuration document on top of the defaults
 */
export function parseConfig(text: string, source: string = 'configuration'): ServerConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`unable to parse ${source}: ${reason}`);
  }

  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigLoadError(`invalid ${source}: ${formatIssues(result.error)}`, result.error.issues);
  }

  return toServerConfig(result.data);
}

/**
 * Load a YAML configuration file
 */
export async function loadConfig(configFile: string): Promise<ServerConfig> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(configFile)).isDirectory();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`unable to read ${configFile}: ${reason}`);
  }
  if (isDirectory) {
    throw new ConfigLoadError(`file given was a directory: ${configFile}`);
  }

  let text: string;
  try {
    text = await readFile(configFile, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`unable to read ${configFile}: ${reason}`);
  }
  return parseConfig(text, configFile);
}
