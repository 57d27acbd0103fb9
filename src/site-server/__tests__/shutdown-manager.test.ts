/**
 * Shutdown Manager Tests
 */

import { ShutdownManager, createShutdownManager } from '../shutdown-manager';
import { flush, silentLogger } from './helpers';

describe('ShutdownManager', () => {
  let manager: ShutdownManager;
  let logger: ReturnType<typeof silentLogger>;
  let exit: jest.Mock;

  beforeEach(() => {
    logger = silentLogger();
    exit = jest.fn();
    manager = createShutdownManager({ timeout: 1000, logger, exit });
  });

  afterEach(() => {
    manager.removeSignalHandlers();
  });

  it('should run every callback once', async () => {
    const first = jest.fn(async () => undefined);
    const second = jest.fn(async () => undefined);
    manager.onShutdown(first);
    manager.onShutdown(second);

    expect(manager.getPhase()).toBe('idle');
    const pending = manager.shutdown();
    expect(manager.shutdown()).toBe(pending);
    await expect(pending).resolves.toBe(true);

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(manager.getPhase()).toBe('done');
  });

  it('should report failing callbacks without skipping the others', async () => {
    const failure = new Error('close failed');
    const other = jest.fn(async () => undefined);
    manager.onShutdown(async () => {
      throw failure;
    });
    manager.onShutdown(other);

    await expect(manager.shutdown()).resolves.toBe(false);
    expect(other).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('[siteserve] shutdown callback error:', failure);
  });

  it('should give up once the timeout expires', async () => {
    const quick = createShutdownManager({ timeout: 20, logger, exit });
    quick.onShutdown(() => new Promise<void>(() => undefined));

    await expect(quick.shutdown()).resolves.toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('[siteserve] shutdown timeout reached, forcing exit');
  });

  it('should shut down and exit on a signal', async () => {
    const callback = jest.fn(async () => undefined);
    manager.onShutdown(callback);
    const before = process.listenerCount('SIGTERM');

    manager.setupSignalHandlers(['SIGTERM']);
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);

    process.emit('SIGTERM', 'SIGTERM');
    await flush();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(logger.info).toHaveBeenCalledWith('[siteserve] received SIGTERM, shutting down gracefully...');
  });

  it('should exit with a failure code when shutdown fails', async () => {
    manager.onShutdown(async () => {
      throw new Error('close failed');
    });
    manager.setupSignalHandlers(['SIGINT']);

    process.emit('SIGINT', 'SIGINT');
    await flush();

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should remove its signal handlers', () => {
    const before = process.listenerCount('SIGINT');
    manager.setupSignalHandlers(['SIGINT']);
    manager.removeSignalHandlers();

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
