export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * Leveled logger. Writes to stderr so stdout stays reserved for protocol traffic.
 */
export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(minLevel: LogLevel = 'info', sink: LogSink = process.stderr) {
    this.minLevel = minLevel;
    this.sink = sink;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    let line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    this.sink.write(`${line}\n`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }
}

// Used where no logger is injected, e.g. in tests
export const silentLogger = new Logger('error', { write: () => true });
