import {
  LogEntry,
  LogLevel,
  createLogger,
  parseLogLevel,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
} from '../src/logger';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    setLogHandler(() => undefined);
    setLogLevel(LogLevel.Info);
  });

  test('child loggers merge their context', () => {
    const log = createLogger({ component: 'tracegen' }).child({ module: 'registry' });
    log.info('Tracepoint registered', { name: 'start_blit' });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Info);
    expect(entries[0].message).toBe('Tracepoint registered');
    expect(entries[0].context).toEqual({ component: 'tracegen', module: 'registry', name: 'start_blit' });
  });

  test('suppresses messages below the minimum level', () => {
    const log = createLogger();
    setLogLevel(LogLevel.Warn);
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown');
    expect(entries.map((e) => e.level)).toEqual([LogLevel.Warn, LogLevel.Error]);
  });

  test('parses level names case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.Warn);
    expect(parseLogLevel(' error ')).toBe(LogLevel.Error);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  test('the default handler writes JSON lines to stderr', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      resetLogHandler();
      const log = createLogger({ component: 'tracegen' });
      log.error('Generation failed', { code: 'GENERATION.FAILED' });
      log.warn('Unused toggle');

      expect(entries).toEqual([]);
      expect(error).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({
        level: 'error',
        msg: 'Generation failed',
        component: 'tracegen',
        code: 'GENERATION.FAILED',
      });
      expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({ level: 'warn', msg: 'Unused toggle' });
    } finally {
      error.mockRestore();
      warn.mockRestore();
    }
  });
});
