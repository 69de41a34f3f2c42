import { createLogger, isLogLevel, resolveLogLevel, setLogLevel } from './logger';

describe('logger', () => {
  const originalLogLevel = process.env['LOG_LEVEL'];
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLogLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLogLevel;
    }
  });

  it('prefixes messages and filters below its level', () => {
    const logger = createLogger('[Test] ', 'warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[Test] shown');
  });

  it('setLogLevel changes loggers that already exist', () => {
    const logger = createLogger('[Late] ', 'silent');

    setLogLevel('info');
    logger.info('now visible');
    setLogLevel('silent');
    logger.info('hidden again');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[Late] now visible');
  });

  it('resolves explicit level before LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'error';

    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel()).toBe('error');
  });

  it('ignores an unknown LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'loud';

    // Jest sets NODE_ENV=test
    expect(resolveLogLevel()).toBe('silent');
    expect(isLogLevel('loud')).toBe(false);
    expect(isLogLevel('warn')).toBe(true);
  });
});
