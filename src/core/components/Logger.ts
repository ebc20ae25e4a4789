/**
 * Global Logger Utility for Zipstep
 * Provides centralized console control with configurable log levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as string[]).includes(value);
}

/**
 * Global Logger class for controlling console output throughout Zipstep
 */
export class Logger {
  private static config: LoggerConfig = {
    enabled: true,
    level: 'info'
  };

  private static originalConsole = {
    log: console.log,
    error: console.error,
    warn: console.warn,
    info: console.info
  };

  /**
   * Configure the logger
   */
  static configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Get current logger configuration
   */
  static getConfig(): LoggerConfig {
    return { ...this.config };
  }

  static enable(): void {
    this.config.enabled = true;
  }

  /**
   * Disable all logging
   */
  static disable(): void {
    this.config.enabled = false;
  }

  static setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Check if a log level should be output
   */
  static shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.config.level);
  }

  static log(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      this.originalConsole.log(...args);
    }
  }

  static error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      this.originalConsole.error(...args);
    }
  }

  static warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      this.originalConsole.warn(...args);
    }
  }

  /**
   * Log a debug message
   */
  static debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      // Use console.log for debug messages to ensure they're visible
      this.originalConsole.log(...args);
    }
  }

  static info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      this.originalConsole.info(...args);
    }
  }
}

/**
 * Environment-based configuration
 */
export function configureLoggerFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  if (env.ZIPSTEP_DEBUG === 'false') {
    Logger.disable();
  } else if (env.ZIPSTEP_DEBUG === 'true') {
    Logger.enable();
    Logger.setLevel('debug');
  }

  const level = env.ZIPSTEP_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    Logger.setLevel(level);
  }

  if (env.NODE_ENV === 'production') {
    Logger.setLevel('error');
  }
}

// Auto-configure from environment on import
configureLoggerFromEnvironment();
