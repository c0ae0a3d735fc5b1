import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  ConsoleLogger,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
  parseLogLevel,
  LogLevel,
} from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';

describe('Structured Logging', () => {
  let captured: LogEntry[];

  beforeEach(() => {
    captured = [];
    setLogOutput((entry) => captured.push(entry));
    setGlobalLogLevel(LogLevel.DEBUG);
  });

  afterEach(() => {
    resetLogOutput();
    setGlobalLogLevel(LogLevel.INFO);
  });

  it('creates a logger with module name', () => {
    const log = createLogger('ClaimService');
    log.info('hello');
    expect(captured).toHaveLength(1);
    expect(captured[0].module).toBe('ClaimService');
    expect(captured[0].message).toBe('hello');
    expect(captured[0].level).toBe('INFO');
  });

  it('logs all levels', () => {
    const log = createLogger('m');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(captured.map(e => e.level)).toEqual(['DEBUG', 'INFO', 'WARN', 'ERROR']);
  });

  it('includes context when provided and omits it when empty', () => {
    const log = createLogger('m');
    log.info('with context', { proof: '616263', call: 'create_claim' });
    log.info('empty', {});
    log.info('none');
    expect(captured[0].context).toEqual({ proof: '616263', call: 'create_claim' });
    expect(captured[1].context).toBeUndefined();
    expect(captured[2].context).toBeUndefined();
  });

  it('respects global log level', () => {
    setGlobalLogLevel(LogLevel.WARN);
    const log = createLogger('m');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(captured.map(e => e.level)).toEqual(['WARN', 'ERROR']);
    expect(getGlobalLogLevel()).toBe(LogLevel.WARN);
  });

  it('per-logger level overrides global', () => {
    const log = createLogger('m', LogLevel.ERROR);
    log.warn('w');
    log.error('e');
    expect(captured).toHaveLength(1);
    expect(captured[0].level).toBe('ERROR');
  });

  it('SILENT level suppresses all', () => {
    setGlobalLogLevel(LogLevel.SILENT);
    const log = createLogger('m');
    log.error('e');
    expect(captured).toHaveLength(0);
  });

  it('child loggers extend the module name and keep the override', () => {
    const child = new ConsoleLogger('ClaimRegistry', LogLevel.WARN).child('service');
    child.info('dropped');
    child.warn('kept');
    expect(captured).toHaveLength(1);
    expect(captured[0].module).toBe('ClaimRegistry:service');
  });

  it('timestamp is ISO format', () => {
    createLogger('m').info('t');
    expect(new Date(captured[0].timestamp).toISOString()).toBe(captured[0].timestamp);
  });
});

describe('parseLogLevel', () => {
  it('maps names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('verbose')).toBeNull();
  });
});
