#!/usr/bin/env node
/**
 * siteserve CLI
 *
 * Serve a site described by a YAML configuration file
 */

import { program } from 'commander';
import { createShutdownManager, createSiteServer, loadConfig } from './src/site-server';
import type { ListenerAddress } from './src/site-server';
import { VERSION } from './src';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function fail(error: unknown): never {
  log(`❌ ${error instanceof Error ? error.message : String(error)}`, colors.red);
  process.exit(1);
}

function formatAddress(address: ListenerAddress): string {
  const host = address.host.includes(':') ? `[${address.host}]` : address.host;
  return `${address.transport}://${host}:${address.port}`;
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 0) {
    throw new Error(`invalid timeout: ${value}`);
  }
  return timeout;
}

program
  .name('siteserve')
  .description('Embeddable static site and handler server')
  .version(VERSION);

// Serve command
program
  .command('serve')
  .description('Start the listeners described by a configuration file')
  .argument('<config>', 'YAML configuration file')
  .option('-t, --timeout <ms>', 'Upper bound on graceful shutdown (ms)')
  .action(async (configFile: string, options: { timeout?: string }) => {
    try {
      const config = await loadConfig(configFile);
      const timeout = options.timeout !== undefined ? parseTimeout(options.timeout) : config.shutdownTimeout;

      const server = createSiteServer();
      server.configure(config);

      server.on('fatal', (error) => {
        log(`❌ ${error.message}`, colors.red);
        process.exit(1);
      });

      const shutdown = createShutdownManager({ timeout });
      shutdown.onShutdown(() => server.stop(true));
      shutdown.setupSignalHandlers();

      server.start();
      const addresses = await server.whenListening();

      log('\n🚀 siteserve is running\n', colors.bright);
      for (const address of addresses) {
        log(`  ${formatAddress(address)}`, colors.green);
      }
      log('\nPress Ctrl+C to stop\n', colors.yellow);

      await server.wait();
      shutdown.removeSignalHandlers();
    } catch (error) {
      fail(error);
    }
  });

// Check command
program
  .command('check')
  .description('Validate a configuration file and print its routes')
  .argument('<config>', 'YAML configuration file')
  .action(async (configFile: string) => {
    try {
      const config = await loadConfig(configFile);
      const server = createSiteServer();
      server.configure(config);
      server.finalize();

      log('\n✅ Configuration is valid\n', colors.green);
      for (const route of server.getRoutes()) {
        log(`  ${route.pattern.padEnd(32)} ${route.source}`, colors.blue);
      }
      log('');
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
