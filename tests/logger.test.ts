import {
  configureLogging,
  createLogger,
  getLoggingConfig,
  loadLoggingFromEnv,
  resetLogging,
} from '../src/util/logger';

describe('logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    resetLogging();
  });

  test('defaults to errors only', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    info.mockClear();
    error.mockClear();
    const log = createLogger('parser');
    log.info('hidden');
    log.error('shown', 1);
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[parser]', 'shown', 1);
  });

  test('restricts output to the configured modules', () => {
    const debug = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    configureLogging({ level: 'debug', modules: ['lexer'] });
    debug.mockClear();
    createLogger('parser').debug('hidden');
    createLogger('lexer').debug('shown');
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[lexer]', 'shown');
  });

  test('level none silences everything', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    error.mockClear();
    configureLogging({ level: 'none' });
    createLogger('cli').error('hidden');
    expect(error).not.toHaveBeenCalled();
  });

  test('loads level and modules from the environment', () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    loadLoggingFromEnv({ BIBFMT_DEBUG: 'parser, lexer' });
    expect(getLoggingConfig()).toMatchObject({ level: 'debug', modules: ['parser', 'lexer'] });

    resetLogging();
    loadLoggingFromEnv({ BIBFMT_LOGLEVEL: 'INFO' });
    expect(getLoggingConfig().level).toBe('info');

    resetLogging();
    loadLoggingFromEnv({ BIBFMT_LOGLEVEL: 'loud' });
    expect(getLoggingConfig().level).toBe('error');
  });
});
