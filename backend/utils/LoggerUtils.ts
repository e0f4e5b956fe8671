/**
 * Tagged console logging for detector services.
 * Level is read from LOG_LEVEL (debug | info | warn | error | silent), default info.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface ServiceLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class LoggerUtils {
  private static currentLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
  }

  public static isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.currentLevel()];
  }

  /**
   * Formats extra data the way the audit logger always has: ` | {json}`
   */
  public static formatData(data: unknown): string {
    if (data === undefined) return '';
    if (typeof data === 'string') return ` | ${data}`;
    try {
      return ` | ${JSON.stringify(data)}`;
    } catch {
      return ` | ${String(data)}`;
    }
  }
}

export function createLogger(tag: string): ServiceLogger {
  const prefix = `[${tag.toUpperCase()}]`;

  return {
    debug(message, data) {
      if (LoggerUtils.isEnabled('debug')) {
        const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
        console.log(`🔍 [${timestamp}]${prefix} ${message}${LoggerUtils.formatData(data)}`);
      }
    },
    info(message, data) {
      if (LoggerUtils.isEnabled('info')) {
        console.log(`✅ ${prefix} ${message}${LoggerUtils.formatData(data)}`);
      }
    },
    warn(message, data) {
      if (LoggerUtils.isEnabled('warn')) {
        console.warn(`⚠️  ${prefix} ${message}${LoggerUtils.formatData(data)}`);
      }
    },
    error(message, error) {
      if (LoggerUtils.isEnabled('error')) {
        if (error === undefined) {
          console.error(`❌ ${prefix} ${message}`);
        } else {
          console.error(`❌ ${prefix} ${message}`, error);
        }
      }
    }
  };
}
