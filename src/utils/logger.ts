export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Logger interface for orchestration observability */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  /** Logger scoped to one run; loggers without scopes are used as they are */
  child?(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Console-based logger with a scope prefix, e.g. `[photon:1a2b3c4d]` */
export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(
    scope?: string,
    private level: LogLevel = 'info',
  ) {
    this.prefix = scope ? `[photon:${scope}]` : '[photon]';
  }

  /** Derive a logger for a run, keeping the level */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(scope.slice(0, 8), this.level);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('info')) console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('warn')) console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('error')) console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('debug')) console.debug(this.format('DEBUG', message, data));
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${level.padEnd(5)} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
