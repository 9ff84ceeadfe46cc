import { appendFileSync, existsSync, mkdirSync, readdirSync, renameSync, statSync, unlinkSync } from 'fs';
import { basename, dirname, join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LEVEL_NAMES: readonly string[] = LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

/**
 * Logging surface handed to components (root logger or a prefixed child)
 */
export interface AppLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface LoggerOptions {
  logFilePath?: string;
  maxLogSizeBytes?: number;
  maxRotatedLogs?: number;
}

/**
 * Logger for the ticket service
 * Writes to stderr and an optional size-rotated log file
 */
export class Logger implements AppLogger {
  private logFilePath: string | null = null;
  private readonly maxLogSizeBytes: number;
  private readonly maxRotatedLogs: number;

  constructor(
    private readonly logLevel: LogLevel = 'info',
    options: LoggerOptions = {}
  ) {
    this.maxLogSizeBytes = options.maxLogSizeBytes ?? 10 * 1024 * 1024; // 10MB
    this.maxRotatedLogs = options.maxRotatedLogs ?? 5;

    if (options.logFilePath) {
      this.initializeLogFile(options.logFilePath);
    }
  }

  /**
   * Initialize log file with rotation
   */
  private initializeLogFile(logFilePath: string): void {
    try {
      const logDir = dirname(logFilePath);
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      this.logFilePath = logFilePath;
      this.rotateLogIfNeeded();
      this.cleanupOldRotatedLogs();

      this.info(`Logging initialized: ${this.logFilePath}`);
    } catch (error) {
      this.logFilePath = null;
      this.error('Failed to initialize log file, falling back to stderr only', error);
    }
  }

  /**
   * Rotate log file if it exceeds max size
   */
  private rotateLogIfNeeded(): void {
    if (!this.logFilePath || !existsSync(this.logFilePath)) {
      return;
    }

    const stats = statSync(this.logFilePath);
    if (stats.size > this.maxLogSizeBytes) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      renameSync(this.logFilePath, `${this.logFilePath}.${timestamp}`);
    }
  }

  /**
   * Clean up old rotated log files
   * Keeps only the most recent N rotated logs
   */
  private cleanupOldRotatedLogs(): void {
    if (!this.logFilePath) {
      return;
    }

    const logDir = dirname(this.logFilePath);
    const prefix = `${basename(this.logFilePath)}.`;

    const rotatedLogs = readdirSync(logDir)
      .filter(name => name.startsWith(prefix))
      .map(name => ({ path: join(logDir, name), mtime: statSync(join(logDir, name)).mtime.getTime() }))
      .sort((a, b) => b.mtime - a.mtime);

    for (const log of rotatedLogs.slice(this.maxRotatedLogs)) {
      unlinkSync(log.path);
    }
  }

  /**
   * Log debug message
   */
  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog('debug')) return;
    this.log('DEBUG', message, meta);
  }

  /**
   * Log info message
   */
  info(message: string, meta?: unknown): void {
    if (!this.shouldLog('info')) return;
    this.log('INFO', message, meta);
  }

  /**
   * Log warning message
   */
  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog('warn')) return;
    this.log('WARN', message, meta);
  }

  /**
   * Log error message
   */
  error(message: string, meta?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.log('ERROR', message, meta);
  }

  /**
   * Create a child logger with prefix
   */
  child(prefix: string): ChildLogger {
    return new ChildLogger(this, prefix);
  }

  /**
   * Write a formatted line to stderr and the log file
   */
  private log(level: string, message: string, meta?: unknown): void {
    const line = formatLogLine(new Date(), level, message, meta);

    try {
      process.stderr.write(line + '\n');
    } catch (error) {
      // EPIPE: stderr reader went away, nothing left to report to
      if (!isErrnoException(error) || error.code !== 'EPIPE') {
        throw error;
      }
    }

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, line + '\n');
      } catch (error) {
        const path = this.logFilePath;
        this.logFilePath = null;
        this.error(`Log file ${path} is no longer writable`, error);
      }
    }
  }

  /**
   * Check if message should be logged based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }
}

/**
 * Child logger with prefix
 */
export class ChildLogger implements AppLogger {
  constructor(
    private readonly parent: AppLogger,
    private readonly prefix: string
  ) {}

  debug(message: string, meta?: unknown): void {
    this.parent.debug(`[${this.prefix}] ${message}`, meta);
  }

  info(message: string, meta?: unknown): void {
    this.parent.info(`[${this.prefix}] ${message}`, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.parent.warn(`[${this.prefix}] ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.parent.error(`[${this.prefix}] ${message}`, meta);
  }

  /**
   * Nest a further prefix under this one
   */
  child(prefix: string): ChildLogger {
    return new ChildLogger(this.parent, `${this.prefix}:${prefix}`);
  }
}

/**
 * Format log message with timestamp, level and optional metadata
 */
export function formatLogLine(timestamp: Date, level: string, message: string, meta?: unknown): string {
  let formatted = `[${timestamp.toISOString()}] [${level.padEnd(5)}] ${message}`;

  if (meta !== undefined) {
    if (typeof meta === 'object' && meta !== null) {
      formatted += ' ' + JSON.stringify(meta, errorReplacer);
    } else {
      formatted += ` ${String(meta)}`;
    }
  }

  return formatted;
}

// Error own-properties are non-enumerable; spell out the useful ones.
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const described: Record<string, unknown> = { name: value.name, message: value.message };
    if (isErrnoException(value) && value.code !== undefined) {
      described.code = value.code;
    }
    if (value.cause !== undefined) {
      described.cause = value.cause;
    }
    return described;
  }
  return value;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
