export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Leveled JSON-lines logger. Writes to stderr so stdout stays free for the stdio transport.
 * `child` binds a component name that is stamped on every line it emits.
 */
export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly component?: string,
    private readonly sink: LogSink = stderrSink
  ) {}

  child(component: string): Logger {
    const scoped = this.component ? `${this.component}.${component}` : component;
    return new Logger(this.minLevel, scoped, this.sink);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (PRIORITY[level] < PRIORITY[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      ...(this.component ? { component: this.component } : {}),
      message,
      ...(context ? { context } : {})
    };

    this.sink(JSON.stringify(payload));
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
