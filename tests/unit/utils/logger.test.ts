/**
 * Unit tests for the logger
 */

import { createLogger } from '../../../src/utils/logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('drops entries below the configured level', () => {
    const logger = createLogger({ level: 'warn' });
    logger.debug('d');
    logger.info('i');
    expect(logSpy).not.toHaveBeenCalled();

    logger.setLevel('debug');
    logger.debug('d');
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logger.getLevel()).toBe('debug');
    expect(logger.isDebugEnabled()).toBe(true);
  });

  it('writes JSON entries with context', () => {
    const logger = createLogger({ level: 'info', format: 'json', source: 'cache' });
    logger.warn('slow', { ms: 12 });

    const entry = JSON.parse(warnSpy.mock.calls[0][0]);
    expect(entry).toMatchObject({ level: 'warn', source: 'cache', message: 'slow', context: { ms: 12 } });
  });

  it('accepts an error with context', () => {
    const logger = createLogger({ level: 'info', format: 'json' });
    logger.error('failed', new Error('boom'), { key: 'k' });

    const entry = JSON.parse(errorSpy.mock.calls[0][0]);
    expect(entry.error).toMatchObject({ name: 'Error', message: 'boom' });
    expect(entry.context).toEqual({ key: 'k' });
  });

  it('accepts context alone for errors', () => {
    const logger = createLogger({ level: 'info', format: 'json' });
    logger.error('failed', { key: 'k' });

    const entry = JSON.parse(errorSpy.mock.calls[0][0]);
    expect(entry.error).toBeUndefined();
    expect(entry.context).toEqual({ key: 'k' });
  });

  it('formats text lines with the source', () => {
    const logger = createLogger({ level: 'info', format: 'text', source: 'cache' });
    logger.info('hello', { a: 1 });
    expect(logSpy.mock.calls[0][0]).toMatch(/^\S+ INFO  \[cache\] hello \{"a":1\}$/);
  });

  it('nests child sources', () => {
    const child = createLogger({ level: 'info', format: 'json', source: 'cache' }).child('store');
    child.info('x');
    expect(JSON.parse(logSpy.mock.calls[0][0]).source).toBe('cache:store');
  });

  it('writes nothing when silent', () => {
    const logger = createLogger({ level: 'debug', silent: true });
    logger.error('x');
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
