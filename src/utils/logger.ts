export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (line: string, ...args: unknown[]) => void;

// stdout carries the game transcript, so every level is written to stderr.
const defaultSink: LogSink = (line, ...args) => {
  // eslint-disable-next-line no-console
  console.error(line, ...args);
};

export class Logger {
  constructor(
    private readonly namespace: string,
    private readonly level: LogLevel = 'info',
    private readonly sink: LogSink = defaultSink,
  ) {}

  private shouldLog(level: LogLevel) {
    return Logger.levels[level] >= Logger.levels[this.level];
  }

  static levels = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
  } as const;

  private emit(level: LogLevel, ...args: unknown[]) {
    if (!this.shouldLog(level)) return;
    const tag = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.namespace}]`;
    this.sink(tag, ...args);
  }

  child(namespace: string) {
    return new Logger(`${this.namespace}.${namespace}`, this.level, this.sink);
  }

  debug(...args: unknown[]) { this.emit('debug', ...args); }
  info(...args: unknown[]) { this.emit('info', ...args); }
  warn(...args: unknown[]) { this.emit('warn', ...args); }
  error(...args: unknown[]) { this.emit('error', ...args); }
}

export const createLogger = (namespace: string, level: LogLevel = 'info', sink?: LogSink) =>
  new Logger(namespace, level, sink);
