import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, logError, logRequest, redactHeaders } from '../index.js';
import type { Logger } from '../index.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ timestamps: false });

    logger.info('ignored');
    logger.warn('Connection dropped', { attempt: 1 });

    expect(logger.level).toBe('warn');
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[tm1] WARN Connection dropped {"attempt":1}');
  });

  it('should write lower levels to stdout without an empty context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'debug', timestamps: false });

    logger.debug('Outgoing request', { method: 'GET' });
    logger.info('Connected', {});

    expect(log).toHaveBeenNthCalledWith(1, '[tm1] DEBUG Outgoing request {"method":"GET"}');
    expect(log).toHaveBeenNthCalledWith(2, '[tm1] INFO Connected');
  });
});

describe('logError', () => {
  it('should name the failed operation', () => {
    const error = vi.fn();
    const logger: Logger = { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error };

    logError(logger, new TypeError('bad url'), 'connect');

    expect(error).toHaveBeenCalledWith('connect failed', { error: 'TypeError', message: 'bad url' });
  });
});

describe('redactHeaders', () => {
  it('should mask credentials only', () => {
    expect(
      redactHeaders({ Authorization: 'Basic abc', Cookie: 'TM1SessionId=abc', 'TM1-SessionContext': 'tm1-rest-client' })
    ).toEqual({ Authorization: '***', Cookie: '***', 'TM1-SessionContext': 'tm1-rest-client' });
  });

  it('should log requests with redacted headers', () => {
    const debug = vi.fn();
    const logger: Logger = { trace: vi.fn(), debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    logRequest(logger, 'GET', 'http://tm1.test/api/v1/Cubes', { Authorization: 'Bearer test-token' });

    expect(debug).toHaveBeenCalledWith('Outgoing request', {
      method: 'GET',
      url: 'http://tm1.test/api/v1/Cubes',
      headers: { Authorization: '***' },
    });
  });
});
