import { loadEnv } from '../config/env.js';

export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

interface LoggerConfig {
  level: LogLevel;
  showTimestamps?: boolean;
}

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL,
    showTimestamps: false
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
      Logger.instance.setLevel(parseLogLevel(loadEnv().LOG_LEVEL));
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  // Create a contextual logger
  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.config.level) return;

    // In quiet mode only QUIET messages get through
    if (this.config.level === LogLevel.QUIET && level !== LogLevel.QUIET) {
      return;
    }

    console.log(this.format(message, context));
    if (data !== undefined) {
      console.log(data);
    }
  }

  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  error(message: string, context?: string, data?: unknown): void {
    // Errors always show unless in quiet mode
    if (this.config.level > LogLevel.QUIET) {
      console.error(this.format(message, context));
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  private format(message: string, context?: string): string {
    const prefix = context ? `[${context}] ` : '';
    const stamp = this.config.showTimestamps ? `${new Date().toISOString()} ` : '';
    return `${stamp}${prefix}${message}`;
  }
}

// Contextual logger for component-specific logging
export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

export const logger = Logger.getInstance();

export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};
