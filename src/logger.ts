// src/logger.ts

import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/link-types.js';

const LOG_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'path',
  'state',
  'sessionId',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'sessionId', 'path', 'state'];
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line: header fields first, then the arguments, then any
   * context keys that are not header fields.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    for (const field of this.logFormat) {
      switch (field) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (merged.logger) headerParts.push(`[${merged.logger}]`);
          break;
        case 'path':
          if (merged.path) headerParts.push(`[P:${merged.path}]`);
          break;
        case 'state':
          if (merged.state) headerParts.push(`[S:${merged.state}]`);
          break;
        case 'sessionId':
          if (merged.sessionId) headerParts.push(`[#${merged.sessionId.slice(0, 8)}]`);
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    for (const field of LOG_FIELDS) delete contextToPrint[field];
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context: { ...this.globalContext, ...context } });
    }

    const sink = level === 'trace' ? console.debug : console[level];
    sink(...this.format(level, args, context));
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private emit(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.emit('trace', args);
  }

  debug(...args: unknown[]): void {
    this.emit('debug', args);
  }

  info(...args: unknown[]): void {
    this.emit('info', args);
  }

  warn(...args: unknown[]): void {
    this.emit('warn', args);
  }

  error(...args: unknown[]): void {
    this.emit('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${String(level)}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  disableColors(): void {
    this.useColors = false;
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => LOG_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${LOG_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.emit('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.emit('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.emit('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.emit('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.emit('error', args, { logger: name }),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !ArrayBuffer.isView(value) &&
    !(value instanceof Error)
  );
}

/**
 * Shared instance every module derives its category logger from.
 */
export const rootLogger = new Logger();

export default Logger;
