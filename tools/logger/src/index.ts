type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Returns a logger that drops every call below `level`.
   */
  withMinimumLevel(level: LogLevel): Logger {
    const threshold = LOG_LEVEL_ORDER[level];
    const pick = (methodLevel: LogLevel): LogFn =>
      LOG_LEVEL_ORDER[methodLevel] >= threshold ? this[methodLevel] : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
    });
  }
}

interface ConsoleLoggerOptions {
  /** Minimum level written to the console (default: 'info') */
  level?: LogLevel;
  /** Console-like sink, mainly for tests (default: global console) */
  sink?: Pick<Console, LogLevel>;
}

/**
 * Creates a Logger that writes to the console.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const sink = options.sink ?? console;

  return new Logger({
    debug: (...args) => sink.debug(...args),
    info: (...args) => sink.info(...args),
    warn: (...args) => sink.warn(...args),
    error: (...args) => sink.error(...args),
  }).withMinimumLevel(options.level ?? 'info');
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

export { Logger, createConsoleLogger, isLogLevel };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
