export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  write(line: string): void;
}

/**
 * Minimal logging surface the engine depends on.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error, ...args: unknown[]): void;
  stateChange(component: string, from: string, to: string): void;
}

const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(line + '\n');
  }
};

/**
 * Centralized logging service.
 *
 * Writes to stderr by default: the MCP server owns stdout for its transport.
 */
export class LoggingService implements Logger {
  private readonly name: string;
  private readonly logLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(name: string = 'manuscript-assembler', logLevel: LogLevel = LogLevel.INFO, sink: LogSink = stderrSink) {
    this.name = name;
    this.logLevel = logLevel;
    this.sink = sink;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.log('INFO', message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.log('WARN', message, ...args);
    }
  }

  error(message: string, error?: Error, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      this.log('ERROR', message, ...args);
      if (error) {
        this.sink.write(`  Stack: ${error.stack ?? error.message}`);
      }
    }
  }

  stateChange(component: string, from: string, to: string): void {
    this.info(`${component}: ${from} -> ${to}`);
  }

  /**
   * Derive a logger for a sub-component sharing level and sink.
   */
  child(name: string): LoggingService {
    return new LoggingService(`${this.name}:${name}`, this.logLevel, this.sink);
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private log(level: string, message: string, ...args: unknown[]): void {
    const timestamp = new Date().toISOString();
    this.sink.write(`[${timestamp}] [${level}] [${this.name}] ${message}`);

    for (const arg of args) {
      if (typeof arg === 'object' && arg !== null) {
        this.sink.write(`  ${JSON.stringify(arg, null, 2)}`);
      } else {
        this.sink.write(`  ${String(arg)}`);
      }
    }
  }
}

/**
 * Parse a level name such as "info" or "WARN".
 */
export function parseLogLevel(value: string): LogLevel | null {
  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return null;
  }
}
