export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LineSink = (line: string) => void;

// stdout stays clean for the JSON run results the CLI prints.
const stderrSink: LineSink = (line) => {
  process.stderr.write(line + '\n');
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly scope?: string,
    private readonly sink: LineSink = stderrSink,
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.minLevel, this.scope ? `${this.scope}:${scope}` : scope, this.sink);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) {
      return;
    }
    const prefix = this.scope ? `[${level}] [${this.scope}]` : `[${level}]`;
    const line = meta ? `${prefix} ${message} ${JSON.stringify(meta)}` : `${prefix} ${message}`;
    this.sink(line);
  }
}
