export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
  constructor(private readonly namespace: string, private readonly level: LogLevel = 'info') {}

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
    // eslint-disable-next-line no-console
    const sink = level === 'debug' ? console.log : console[level];
    sink(tag, ...args);
  }

  child(namespace: string) {
    return new Logger(`${this.namespace}.${namespace}`, this.level);
  }

  debug(...args: unknown[]) { this.emit('debug', ...args); }
  info(...args: unknown[]) { this.emit('info', ...args); }
  warn(...args: unknown[]) { this.emit('warn', ...args); }
  error(...args: unknown[]) { this.emit('error', ...args); }
}

export const createLogger = (namespace: string, level: LogLevel = 'info') =>
  new Logger(namespace, level);
