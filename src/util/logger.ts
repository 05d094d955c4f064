export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 99
}

/**
 * Log categories for filtering logs
 */
export enum LogCategory {
  GENERAL = 'general',
  API = 'api',
  PIPELINE = 'pipeline',
  SYSTEM = 'system'
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enabledCategories?: LogCategory[];
  includeTimestamps?: boolean;
  includeSourceModule?: boolean;
  verboseMode?: boolean;
}

/**
 * Logger interface for standardized logging across the application
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, context?: Record<string, unknown>): void;
  api(message: string, context?: Record<string, unknown>): void;
  pipeline(message: string, context?: Record<string, unknown>): void;
  marker(message: string): void;
  setLogLevel(level: LogLevel): void;
  getLogLevel(): LogLevel;
  enableCategory(category: LogCategory): void;
  disableCategory(category: LogCategory): void;
  isCategoryEnabled(category: LogCategory): boolean;
  formatValue(value: unknown): string;
}

/**
 * Where formatted lines end up. Defaults to the console.
 */
export interface LogSink {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Detect if running in development mode
 * @returns True if running in development mode
 */
export function isRunningInDevMode(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.SE_DEBUG === 'true';
}

/**
 * Parse a log level name such as "debug" or "WARN"
 * @returns The matching level, or undefined for unknown names
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  switch (name.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'NONE': return LogLevel.NONE;
    default: return undefined;
  }
}

function getFormattedTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').substring(0, 23);
}

/**
 * Format a value for logging based on its type
 * @param value Value to format
 * @returns Formatted string representation
 */
function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  if (typeof value === 'object') {
    if (value instanceof Error) {
      return `Error: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      if (value.length > 10) {
        return `Array(${value.length}) [${value.slice(0, 3).map(formatValue).join(', ')}, ... ${value.length - 6} more ..., ${value.slice(-3).map(formatValue).join(', ')}]`;
      }
      return `[${value.map(formatValue).join(', ')}]`;
    }
    try {
      return JSON.stringify(value, null, 2);
    } catch (e) {
      return `[Object: circular or too complex to stringify]`;
    }
  }

  return String(value);
}

export class ConsoleLogger implements Logger {
  private sink: LogSink;
  private logLevel: LogLevel;
  private logPrefix: string;
  private enabledCategories: Set<LogCategory>;
  private includeTimestamps: boolean;
  private includeSourceModule: boolean;
  private verboseMode: boolean;
  private sourceModule: string;

  constructor(options: LoggerConfig = {}, sink: LogSink = console) {
    this.sink = sink;
    this.logLevel = options.level ?? LogLevel.INFO;
    this.logPrefix = options.prefix ? `[${options.prefix}] ` : '';
    this.sourceModule = options.prefix ? '' : 'SiteEnergy';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.includeSourceModule = options.includeSourceModule ?? true;
    this.verboseMode = options.verboseMode ?? isRunningInDevMode();

    this.enabledCategories = new Set<LogCategory>(
      options.enabledCategories || Object.values(LogCategory)
    );
  }

  /**
   * Get the log prefix including timestamp and source module if enabled
   */
  private getLogPrefix(): string {
    let prefix = '';

    if (this.includeTimestamps) {
      prefix += `[${getFormattedTimestamp()}] `;
    }

    if (this.includeSourceModule && this.sourceModule) {
      prefix += `[${this.sourceModule}] `;
    }

    return prefix + this.logPrefix;
  }

  public formatValue(value: unknown): string {
    return formatValue(value);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.info(`Log level set to ${LogLevel[level]}`);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public enableCategory(category: LogCategory): void {
    this.enabledCategories.add(category);
    this.debug(`Enabled log category: ${category}`);
  }

  public disableCategory(category: LogCategory): void {
    this.enabledCategories.delete(category);
    this.debug(`Disabled log category: ${category}`);
  }

  public isCategoryEnabled(category: LogCategory): boolean {
    return this.enabledCategories.has(category);
  }

  /**
   * Log a debug message. Only emitted in verbose mode.
   */
  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (this.verboseMode) {
        this.sink.log(`DEBUG: ${this.getLogPrefix()}${message}`, ...args);
      }
    }
  }

  public log(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`INFO: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  /**
   * Log an API-related message
   */
  public api(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.API)) {
      const contextStr = context ? this.formatValue(context) : '';
      this.sink.log(`API: ${this.getLogPrefix()}${message}${contextStr ? ' ' + contextStr : ''}`);
    }
  }

  /**
   * Log a fetch-pipeline progress message
   */
  public pipeline(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.PIPELINE)) {
      const contextStr = context ? this.formatValue(context) : '';
      this.sink.log(`PIPELINE: ${this.getLogPrefix()}${message}${contextStr ? ' ' + contextStr : ''}`);
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.WARN && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (context) {
        this.sink.log(`WARN: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else {
        this.sink.log(`WARN: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  public error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.ERROR && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (error instanceof Error) {
        if (context) {
          this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, error, this.formatValue(context));
        } else {
          this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, error);
        }
      } else if (context) {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  /**
   * Log a special marker or important message
   */
  public marker(message: string): void {
    this.sink.log(`${this.getLogPrefix()}===== ${message} =====`);
  }
}

/**
 * Create a bare console logger for modules constructed without one
 */
export function createFallbackLogger(prefix: string = 'SiteEnergy'): Logger {
  let currentLogLevel = LogLevel.INFO;
  const enabledCategories = new Set<LogCategory>(Object.values(LogCategory));

  const fallbackLogger: Logger = {
    log: (message: string, ...args: unknown[]) => console.log(`[${prefix}] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => console.log(`[${prefix}] INFO: ${message}`, ...args),
    error: (message: string, error?: Error | unknown, context?: Record<string, unknown>) => {
      console.error(`[${prefix}] ERROR: ${message}`, error, context);
    },
    debug: (message: string, ...args: unknown[]) => {
      if (currentLogLevel <= LogLevel.DEBUG) {
        console.log(`[${prefix}] DEBUG: ${message}`, ...args);
      }
    },
    warn: (message: string, context?: Record<string, unknown>) => console.warn(`[${prefix}] WARN: ${message}`, context),
    api: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] API: ${message}`, context),
    pipeline: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] PIPELINE: ${message}`, context),
    marker: (message: string) => console.log(`[${prefix}] MARKER: ${message}`),
    setLogLevel: (level: LogLevel) => {
      currentLogLevel = level;
      console.log(`[${prefix}] Log level set to ${LogLevel[level]}`);
    },
    getLogLevel: () => currentLogLevel,
    enableCategory: (category: LogCategory) => {
      enabledCategories.add(category);
    },
    disableCategory: (category: LogCategory) => {
      enabledCategories.delete(category);
    },
    isCategoryEnabled: (category: LogCategory) => enabledCategories.has(category),
    formatValue: (value: unknown) => formatValue(value)
  };

  return fallbackLogger;
}
