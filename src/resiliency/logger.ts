/**
 * Structured Logger
 *
 * Component-scoped logging for the warden:
 * - coloured text or JSON lines on the console
 * - optional append-only JSON log file, rotated by size
 * - child loggers carrying extra context
 * - every entry re-emitted as a `log` event
 */

import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  console: boolean;
  file?: string;
  maxFileSize: number; // bytes
  maxFiles: number;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
  fatal: '\x1b[35m', // magenta
};

const RESET = '\x1b[0m';

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  json: process.env.NODE_ENV === 'production',
  console: true,
  maxFileSize: 10 * 1024 * 1024,
  maxFiles: 5,
};

/**
 * Size-rotated append-only file. Shared between a logger and its children so
 * they all count bytes against the same file.
 */
export class RotatingFile {
  private size = 0;

  constructor(
    private readonly filePath: string,
    private readonly maxFileSize: number,
    private readonly maxFiles: number
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    if (fs.existsSync(filePath)) {
      this.size = fs.statSync(filePath).size;
    }
  }

  write(line: string): void {
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxFileSize) {
      this.rotate();
    }
    // Synchronous so a rotation never races a pending write
    fs.appendFileSync(this.filePath, line);
    this.size += bytes;
  }

  private rotate(): void {
    // app.log.4 -> dropped, app.log.3 -> app.log.4, ..., app.log -> app.log.1
    const oldest = `${this.filePath}.${this.maxFiles - 1}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.maxFiles - 2; i >= 1; i--) {
      const from = `${this.filePath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.filePath}.${i + 1}`);
      }
    }
    if (fs.existsSync(this.filePath)) {
      fs.renameSync(this.filePath, `${this.filePath}.1`);
    }
    this.size = 0;
  }
}

export class Logger extends EventEmitter {
  private readonly config: LoggerConfig;
  private readonly component: string;
  private context: Record<string, unknown> = {};
  private file?: RotatingFile;

  constructor(component: string, config: Partial<LoggerConfig> = {}, file?: RotatingFile) {
    super();
    this.component = component;
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (file) {
      this.file = file;
    } else if (this.config.file) {
      this.file = new RotatingFile(this.config.file, this.config.maxFileSize, this.config.maxFiles);
    }
  }

  /**
   * Create a logger for a sub-component that shares this logger's sinks
   */
  child(component: string, context: Record<string, unknown> = {}): Logger {
    const child = new Logger(component, this.config, this.file);
    child.context = { ...this.context, ...context };
    child.on('log', (entry: LogEntry) => this.emit('log', entry));
    return child;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.log('fatal', message, context);
  }

  /**
   * Log a caught value, keeping the stack when it is an Error
   */
  logError(err: unknown, message?: string, context?: Record<string, unknown>): void {
    if (err instanceof Error) {
      this.log('error', message || err.message, {
        ...context,
        error: { name: err.name, message: err.message, stack: err.stack },
      });
      return;
    }
    this.log('error', message || String(err), { ...context, error: { name: 'Error', message: String(err) } });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      ...this.context,
      ...context,
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
    };

    this.emit('log', entry);

    if (this.config.console) {
      this.writeConsole(entry);
    }
    this.file?.write(JSON.stringify(entry) + '\n');
  }

  private writeConsole(entry: LogEntry): void {
    const write = LOG_LEVELS[entry.level] >= LOG_LEVELS.error ? console.error : console.log;

    if (this.config.json) {
      write(JSON.stringify(entry));
      return;
    }

    const { timestamp, level, component, message, ...fields } = entry;
    const levelStr = level.toUpperCase().padEnd(5);
    let line = `${timestamp} ${LEVEL_COLORS[level]}${levelStr}${RESET} ${`[${component}]`.padEnd(14)} ${message}`;
    if (Object.keys(fields).length > 0) {
      line += ` ${JSON.stringify(fields)}`;
    }
    write(line);
  }
}

// Process-wide defaults applied by createLogger
let globalConfig: Partial<LoggerConfig> = {};

export function configure(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

export function createLogger(component: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(component, { ...globalConfig, ...config });
}
