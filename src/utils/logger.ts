/**
 * Console logging for the driver.
 *
 * Verbosity comes from OVERDRIVE_DEBUG: 0 (default) logs errors and warnings,
 * 1 adds connection events, 2 adds per-frame traffic.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export enum LogLevel {
  ERROR = 0,
  INFO = 1,
  DEBUG = 2,
}

export function levelFromEnv(value: string | undefined = process.env.OVERDRIVE_DEBUG): LogLevel {
  if (value === 'true') {
    return LogLevel.INFO;
  }
  const parsed = Number.parseInt(value ?? '', 10);
  if (Number.isNaN(parsed) || parsed <= LogLevel.ERROR) {
    return LogLevel.ERROR;
  }
  return parsed >= LogLevel.DEBUG ? LogLevel.DEBUG : LogLevel.INFO;
}

/**
 * Create a console logger whose lines carry a `[overdrive]` prefix.
 *
 * @param scope - Optional scope appended to the prefix, e.g. the vehicle address
 */
export function createLogger(scope?: string, level: LogLevel = levelFromEnv()): Logger {
  const prefix = scope ? `[overdrive ${scope}]` : '[overdrive]';

  return {
    debug(message) {
      if (level >= LogLevel.DEBUG) console.debug(prefix, message);
    },
    info(message) {
      if (level >= LogLevel.INFO) console.log(prefix, message);
    },
    warn(message) {
      console.warn(prefix, message);
    },
    error(message, error) {
      if (error === undefined) {
        console.error(prefix, message);
      } else {
        console.error(prefix, message, error);
      }
    },
  };
}

export function hex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join(' ');
}
