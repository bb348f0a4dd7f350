import logger from '../../../utils/logger';

/**
 * Log levels enum
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  NONE = 'none'
}

export interface TaggedLogger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string | Error, context?: object): void;
}

export interface LoggingOptions {
  level: string;
  disabledTags: string[];
}

/**
 * Utilities for logging in the scraper service
 */
export class LoggingUtils {
  private static currentLevel: LogLevel = LogLevel.DEBUG;
  private static disabledTags: Set<string> = new Set();

  /**
   * Sets the floor below which scraper messages are dropped before reaching winston
   */
  static setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  /**
   * Silence one component, e.g. `disableTag('robots')` while debugging the extractor
   */
  static disableTag(tag: string): void {
    this.disabledTags.add(tag.toLowerCase());
  }

  /**
   * Apply the logging section of the configuration to winston and to the tag gate.
   * Levels winston knows but the scraper does not (`verbose`, `silly`, ...) leave
   * filtering to winston.
   */
  static configure(options: LoggingOptions): void {
    if (options.level in logger.levels) {
      logger.level = options.level;
    }
    this.setLogLevel(Object.values(LogLevel).find(level => level === options.level) ?? LogLevel.DEBUG);
    this.disabledTags.clear();
    options.disabledTags.forEach(tag => this.disableTag(tag));
  }

  static isTagEnabled(tag: string): boolean {
    return !this.disabledTags.has(tag.toLowerCase());
  }

  /**
   * Format and log a message based on level, tag, and context
   */
  private static log(level: LogLevel, message: string | Error, tag: string, context?: object): void {
    if (this.isLevelDisabled(level) || !this.isTagEnabled(tag)) {
      return;
    }

    let text: string;
    let meta = context;
    if (message instanceof Error) {
      text = message.message;
      meta = { ...context, stack: message.stack, name: message.name };
    } else {
      text = message;
    }

    const formattedMessage = `[${tag}] ${text}`;

    switch (level) {
      case LogLevel.DEBUG:
        logger.debug(formattedMessage, meta);
        break;
      case LogLevel.INFO:
        logger.info(formattedMessage, meta);
        break;
      case LogLevel.WARN:
        logger.warn(formattedMessage, meta);
        break;
      case LogLevel.ERROR:
        logger.error(formattedMessage, meta);
        break;
    }
  }

  private static isLevelDisabled(level: LogLevel): boolean {
    if (this.currentLevel === LogLevel.NONE) {
      return true;
    }

    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    return levels.indexOf(level) < levels.indexOf(this.currentLevel);
  }

  /**
   * Create a scoped logger with a fixed tag
   * @param tag The tag to scope the logger with
   */
  static createTaggedLogger(tag: string): TaggedLogger {
    return {
      debug: (message, context) => this.log(LogLevel.DEBUG, message, tag, context),
      info: (message, context) => this.log(LogLevel.INFO, message, tag, context),
      warn: (message, context) => this.log(LogLevel.WARN, message, tag, context),
      error: (message, context) => this.log(LogLevel.ERROR, message, tag, context)
    };
  }
}
