import { describe, it, expect, afterEach, vi } from 'vitest';
import { ObservaLogger, createLogger, setDebugMode, isDebugMode, type LogEntry } from '../observability/logger.js';

describe('ObservaLogger', () => {
  afterEach(() => {
    setDebugMode(false);
  });

  describe('creation', () => {
    it('should create via factory', () => {
      const logger = createLogger({ module: 'test' });
      expect(logger).toBeInstanceOf(ObservaLogger);
      expect(logger.module).toBe('test');
    });

    it('should default the module name', () => {
      expect(createLogger().module).toBe('observa');
    });

    it('should prefix child loggers with the parent module', () => {
      const entries: LogEntry[] = [];
      const parent = createLogger({ module: 'app', handler: (e) => entries.push(e) });
      const child = parent.child('Person');

      child.warn('careful');

      expect(child.module).toBe('app:Person');
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ level: 'warn', module: 'app:Person', message: 'careful' });
    });
  });

  describe('log levels', () => {
    it('should call handler for warn and above at default level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('should include debug when level is debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: (e) => entries.push(e) });
      logger.debug('debug msg', { key: 'age' });
      expect(entries).toHaveLength(1);
      expect(entries[0]?.context).toEqual({ key: 'age' });
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should report enabled levels', () => {
      const logger = createLogger({ level: 'info' });
      expect(logger.isLevelEnabled('debug')).toBe(false);
      expect(logger.isLevelEnabled('info')).toBe(true);
      expect(logger.isLevelEnabled('error')).toBe(true);
    });
  });

  describe('debug mode', () => {
    it('should enable global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
    });

    it('should override level when debug mode is on', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      setDebugMode(true);
      logger.debug('should appear');
      expect(entries).toHaveLength(1);
    });

    it('should honour the per-logger debug flag', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ debug: true, level: 'error', handler: (e) => entries.push(e) });
      logger.debug('visible');
      expect(entries).toHaveLength(1);
    });
  });

  describe('error logging', () => {
    it('should include error details', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      const failure = new RangeError('test error');

      logger.error('failed', failure, { extra: 'data' });

      expect(entries).toHaveLength(1);
      expect(entries[0]?.context).toEqual({ extra: 'data' });
      expect(entries[0]?.error).toEqual({ name: 'RangeError', message: 'test error', stack: failure.stack });
    });

    it('should describe thrown non-errors', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ handler: (e) => entries.push(e) });
      logger.error('failed', 'plain string');
      expect(entries[0]?.error).toEqual({ name: 'NonError', message: 'plain string' });
    });

    it('should omit error details when none are given', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ handler: (e) => entries.push(e) });
      logger.error('failed');
      expect(entries[0]).not.toHaveProperty('error');
    });
  });

  describe('output', () => {
    it('should output JSON when configured', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const logger = createLogger({ module: 'test', json: true });
      logger.warn('json test');
      expect(spy).toHaveBeenCalledTimes(1);
      const parsed: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({ level: 'warn', message: 'json test', module: 'test' });
      spy.mockRestore();
    });

    it('should stay silent without handler or JSON output', () => {
      const spies = [
        vi.spyOn(console, 'log').mockImplementation(() => {}),
        vi.spyOn(console, 'warn').mockImplementation(() => {}),
        vi.spyOn(console, 'error').mockImplementation(() => {}),
      ];
      createLogger().error('nobody hears this');
      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
        spy.mockRestore();
      }
    });
  });
});
