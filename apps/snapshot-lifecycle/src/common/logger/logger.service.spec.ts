import { ConfigService } from '@nestjs/config';
import { LogEntry, LoggerService } from './logger.service';

const configFrom = (env: Record<string, string>) =>
  ({
    get: jest.fn((key: string) => env[key]),
  }) as unknown as ConfigService;

describe('LoggerService', () => {
  let write: jest.SpyInstance;

  const entries = (): LogEntry[] =>
    write.mock.calls.map(([line]) => JSON.parse(String(line).trim()) as LogEntry);

  beforeEach(() => {
    write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    write.mockRestore();
  });

  describe('in production', () => {
    it('should write one JSON line per entry at or above the configured level', () => {
      const logger = new LoggerService(configFrom({ LOG_LEVEL: 'warn', NODE_ENV: 'production' }));

      logger.log('listing snapshots');
      logger.warn('deletion failed', 'SnapshotLifecycleService');

      const [entry] = entries();
      expect(entries()).toHaveLength(1);
      expect(entry.level).toBe('warn');
      expect(entry.message).toBe('deletion failed');
      expect(entry.context).toBe('SnapshotLifecycleService');
    });

    it('should fall back to info for an unknown level', () => {
      const logger = new LoggerService(configFrom({ LOG_LEVEL: 'chatty', NODE_ENV: 'production' }));

      logger.debug('hidden');
      logger.log('shown');

      expect(entries().map((e) => e.message)).toEqual(['shown']);
    });

    it('should attach error details and structured data', () => {
      const logger = new LoggerService(configFrom({ NODE_ENV: 'production' }));

      logger.error('create failed', new Error('quota reached'), 'Handler');
      logger.log('deleted', { snapshotId: 'snap-31' });

      const [failure, deleted] = entries();
      expect(failure.context).toBe('Handler');
      expect(failure.data?.name).toBe('Error');
      expect(failure.data?.message).toBe('quota reached');
      expect(deleted.data).toEqual({ snapshotId: 'snap-31' });
      expect(deleted.context).toBeUndefined();
    });

    it('should treat a stack string before the context as the stack', () => {
      const logger = new LoggerService(configFrom({ NODE_ENV: 'production' }));

      logger.error('boom', 'Error: boom\n    at run', 'Scheduler');

      const [entry] = entries();
      expect(entry.context).toBe('Scheduler');
      expect(entry.data).toEqual({ stack: 'Error: boom\n    at run' });
    });

    it('should tag entries with the invocation id and default context', () => {
      const logger = new LoggerService(configFrom({ NODE_ENV: 'production' }))
        .setContext('LifecycleHandler')
        .setInvocationId('req-42');

      logger.log('started');

      const [entry] = entries();
      expect(entry.context).toBe('LifecycleHandler');
      expect(entry.invocationId).toBe('req-42');
    });
  });

  describe('in development', () => {
    it('should pretty print to the console instead of stdout JSON', () => {
      const consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = new LoggerService(configFrom({ NODE_ENV: 'development' }));

      logger.log('started', 'Scheduler');

      expect(write).not.toHaveBeenCalled();
      expect(consoleLog).toHaveBeenCalledTimes(1);
      expect(consoleLog.mock.calls[0][0]).toContain('[Scheduler]');
      expect(consoleLog.mock.calls[0][1]).toBe('started');
      consoleLog.mockRestore();
    });
  });
});
