import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLogger, getLogger, setLogger, childLogger, parseLogLevel } from './index';

describe('createLogger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env['NODE_ENV'] = 'test';
    delete process.env['LOG_LEVEL'];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should create a logger with the given name', () => {
    const logger = createLogger({ name: 'test-logger' });
    const bindings = logger.bindings();
    expect(bindings['name']).toBe('test-logger');
  });

  it('should use specified log level', () => {
    const logger = createLogger({ name: 'test', level: 'error' });
    expect(logger.level).toBe('error');
  });

  it('should include base context', () => {
    const logger = createLogger({
      name: 'test',
      base: { service: 'cli', version: '1.0.0' },
    });
    const bindings = logger.bindings();
    expect(bindings['service']).toBe('cli');
    expect(bindings['version']).toBe('1.0.0');
    expect(bindings['env']).toBe('test');
  });

  it('should respect LOG_LEVEL environment variable', () => {
    process.env['LOG_LEVEL'] = 'warn';
    const logger = createLogger({ name: 'test' });
    expect(logger.level).toBe('warn');
  });

  it('should stay silent under test without LOG_LEVEL', () => {
    const logger = createLogger({ name: 'test' });
    expect(logger.level).toBe('silent');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel('silent')).toBe('silent');
  });

  it('rejects unknown levels', () => {
    expect(parseLogLevel('verbose')).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});

describe('getLogger / setLogger', () => {
  it('should return the same logger instance on multiple calls', () => {
    expect(getLogger()).toBe(getLogger());
  });

  it('should allow setting a custom logger', () => {
    const customLogger = createLogger({ name: 'custom', level: 'silent' });
    setLogger(customLogger);
    expect(getLogger().bindings()['name']).toBe('custom');
  });
});

describe('childLogger', () => {
  it('should create a child logger with additional context', () => {
    const parent = createLogger({ name: 'parent', level: 'warn' });
    const child = childLogger(parent, { runId: 'run_123' });

    const bindings = child.bindings();
    expect(bindings['runId']).toBe('run_123');
    expect(bindings['name']).toBe('parent');
    expect(child.level).toBe('warn');
  });
});
