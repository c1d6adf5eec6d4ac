/**
 * Logger for the Material Bridge
 *
 * Supports log levels, a per-area prefix and operation timing.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  identifier?: string | undefined;
  material?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || 'MaterialBridge'
    };
  }

  /**
   * Current minimum level
   */
  get level(): LogLevel {
    return this.options.level;
  }

  /**
   * Derive a logger that shares these options under another level
   */
  withLevel(level: LogLevel): Logger {
    return new Logger({ ...this.options, level });
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m';
      case LogLevel.INFO:
        return '\x1b[36m';
      case LogLevel.WARN:
        return '\x1b[33m';
      case LogLevel.ERROR:
        return '\x1b[31m';
      default:
        return '\x1b[90m';
    }
  }

  /**
   * Get level prefix
   */
  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return 'DEBUG';
      case LogLevel.INFO:
        return 'INFO';
      case LogLevel.WARN:
        return 'WARN';
      case LogLevel.ERROR:
        return 'ERROR';
      default:
        return 'LOG';
    }
  }

  /**
   * Check if should log based on level
   */
  isLevelEnabled(level: LogLevel): boolean {
    if (level === LogLevel.SILENT) return false;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext, data?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    const timestamp = this.formatTimestamp();
    const color = this.getColor(level);
    const reset = '\x1b[0m';
    const prefix = `${this.options.prefix} [${this.getLevelPrefix(level)}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${prefix}${timeStr} ${message}${reset}`;

    if (context) {
      console.log(logMessage, context);
    } else if (data !== undefined) {
      console.log(logMessage, data);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Debug level logging
   */
  debug(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  /**
   * Info level logging
   */
  info(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  /**
   * Warning level logging
   */
  warn(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.WARN, message, context, data);
  }

  /**
   * Error level logging
   */
  error(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.ERROR, message, context, data);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime === undefined) return;

    this.startTimes.delete(operation);
    const duration = this.options.duration ? Date.now() - startTime : undefined;
    this.info(`Completed operation: ${operation}`, {
      operation,
      duration,
      ...context
    });
  }

  /**
   * Run an async operation between startTiming and endTiming
   */
  async withTiming<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LoggerContext
  ): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log conversion stage
   */
  logConversionStage(stage: string, context?: LoggerContext): void {
    this.info(`Conversion stage: ${stage}`, {
      stage,
      ...context
    });
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
      ...context
    });
  }

  /**
   * Log error with context
   */
  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, {
      error: error.message,
      stack: error.stack,
      ...context
    });
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: LogLevel.INFO,
  timestamp: true,
  duration: true,
  prefix: 'MaterialBridge'
});

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific areas
 */
export const LoggerFactory = {
  /**
   * Create logger for the conversion pipeline
   */
  forConversion(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: true,
      prefix: 'MaterialBridge-Conversion'
    });
  },

  /**
   * Create logger for archive extraction
   */
  forExtraction(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: false,
      prefix: 'MaterialBridge-Archive'
    });
  },

  /**
   * Create logger for material and manifest parsing
   */
  forParsing(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: false,
      prefix: 'MaterialBridge-Parser'
    });
  },

  /**
   * Create logger for classification and mapping
   */
  forShaders(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: false,
      prefix: 'MaterialBridge-Shaders'
    });
  }
};
