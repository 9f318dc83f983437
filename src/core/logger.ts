export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function formatMeta(meta: unknown[]): unknown[] {
  return meta.map((item) => {
    if (item instanceof Error) {
      return item.stack ?? `${item.name}: ${item.message}`;
    }
    return item;
  });
}

/**
 * Leveled console logger. Components take an optional instance and fall back
 * to `new Logger('info')`.
 */
export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {}

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, nested);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const prefix = this.scope
      ? `[${new Date().toISOString()}] ${level.toUpperCase()} [${this.scope}]`
      : `[${new Date().toISOString()}] ${level.toUpperCase()}`;
    const extra = formatMeta(meta);
    switch (level) {
      case 'debug':
        console.debug(prefix, message, ...extra);
        break;
      case 'info':
        console.info(prefix, message, ...extra);
        break;
      case 'warn':
        console.warn(prefix, message, ...extra);
        break;
      case 'error':
        console.error(prefix, message, ...extra);
        break;
    }
  }
}
