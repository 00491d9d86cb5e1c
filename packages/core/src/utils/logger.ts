/**
 * Logger utility with consistent formatting and local timestamps
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minimumLevel: LogLevel = 'info';

/**
 * Set the process-wide minimum level (default: 'info')
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Local time as YYYY-MM-DD HH:mm:ss.SSS
 */
export function getLocalTimestamp(date: Date = new Date()): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`
  );
}

export function formatLogMessage(
  level: LogLevel,
  message: string,
  component?: string,
  meta?: LogMeta,
  timestamp: string = getLocalTimestamp()
): string {
  const levelUpper = level.toUpperCase().padEnd(5);
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

  return `[${timestamp}] [${levelUpper}]${component ? ` [${component}]` : ''} ${message}${metaStr}`;
}

export class Logger {
  private readonly component?: string;

  constructor(component?: string) {
    this.component = component;
  }

  /**
   * Create a child logger with a sub-component name
   */
  child(subComponent: string): Logger {
    const fullComponent = this.component
      ? `${this.component}:${subComponent}`
      : subComponent;
    return new Logger(fullComponent);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta = error instanceof Error
      ? { ...meta, error: error.message, stack: error.stack }
      : error !== undefined
        ? { ...meta, error: String(error) }
        : meta;
    this.log('error', message, errorMeta);
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!isEnabled(level)) {
      return;
    }

    const formatted = formatLogMessage(level, message, this.component, meta);
    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.log(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }
}

export function createLogger(component?: string): Logger {
  return new Logger(component);
}
