import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, isLogLevel, logError, type Logger } from '../logging.js';
import { InMemoryMetricsCollector } from '../metrics.js';

describe('Logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('ConsoleLogger', () => {
    it('should write messages with level and context', () => {
      const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new ConsoleLogger('info');

      logger.info('Repository created', { entity: 'Order', methods: 2 });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        expect.stringMatching(/\[INFO\] Repository created \{"entity":"Order","methods":2\}$/)
      );
    });

    it('should drop messages below the minimum level', () => {
      const consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const logger = new ConsoleLogger('warn');

      logger.debug('Resolved derived query');
      logger.warn('Index declared twice');

      expect(consoleDebugSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledWith(expect.stringContaining('[WARN] Index declared twice'));
    });
  });

  describe('isLogLevel', () => {
    it('should recognize the log levels', () => {
      expect(isLogLevel('trace')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
    });
  });

  describe('logError', () => {
    it('should log errors and other thrown values', () => {
      const error = vi.fn();
      const logger: Logger = { error, warn: vi.fn(), info: vi.fn(), debug: vi.fn(), trace: vi.fn() };

      logError(logger, 'Query', 'Orders', new TypeError('bad key'));
      logError(logger, 'Scan', 'Orders', 'timeout');

      expect(error).toHaveBeenNthCalledWith(1, 'Query failed', {
        tableName: 'Orders',
        errorName: 'TypeError',
        errorMessage: 'bad key',
      });
      expect(error).toHaveBeenNthCalledWith(2, 'Scan failed', { tableName: 'Orders', error: 'timeout' });
    });
  });
});

describe('InMemoryMetricsCollector', () => {
  it('should key counters by sorted labels', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.incrementCounter('calls', 1, { table: 'Orders', operation: 'Query' });
    metrics.incrementCounter('calls', 2, { operation: 'Query', table: 'Orders' });

    expect(metrics.getCounter('calls', { operation: 'Query', table: 'Orders' })).toBe(3);
    expect(metrics.getCounter('calls')).toBe(0);
  });

  it('should summarize histograms and reset', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.recordHistogram('items', 4);
    metrics.recordHistogram('items', 1);

    expect(metrics.getHistogram('items')).toEqual({ count: 2, sum: 5, min: 1, max: 4 });

    metrics.reset();
    expect(metrics.getHistogram('items')).toBeUndefined();
  });
});
