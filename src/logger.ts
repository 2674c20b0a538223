// src/logger.ts

import { LogContext, LogEvent, LogField, LoggerInstance, LogLevel } from './types/telemetry-types.js';

const LOG_FIELDS: LogField[] = ['timestamp', 'level', 'logger', 'device', 'port'];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'device'];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private mutedDevices: Set<string> = new Set();
  private watchCallback: ((event: LogEvent) => void) | null = null;


  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private field(name: LogField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[name] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @param level - Log level (trace, debug, info, warn, error)
   * @param args - Arguments to be logged
   * @param context - Context object with additional information
   * @returns Formatted log message
   */
  format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger) {
      headerParts.push(this.field('logger', context.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('device') && context.device) {
      headerParts.push(this.field('device', context.device, v => `[D:${String(v)}]`));
    }
    if (this.logFormat.includes('port') && context.port) {
      headerParts.push(this.field('port', context.port, v => `[P:${String(v)}]`));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    delete contextToPrint.logger;
    delete contextToPrint.device;
    delete contextToPrint.port;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  /**
   * Determines whether a log message should be logged based on level, context and mutes.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    const device = context.device;
    if (device && this.mutedDevices.has(device)) return false;

    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const [head = '', ...rest] = this.format(level, args, context);
    console[level](head, ...rest);
  }

  /**
   * Splits the arguments into the main arguments and the trailing context object.
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

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    if (!Array.isArray(fields) || !fields.every(f => LOG_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${LOG_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (field === 'timestamp' || field === 'level' || !LOG_FIELDS.includes(field)) {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  mute(device: string): void {
    this.mutedDevices.add(device);
  }

  unmute(device: string): void {
    this.mutedDevices.delete(device);
  }

  watch(callback: (event: LogEvent) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - Category name shown in the header
   * @param context - Fields added to every line of this instance
   */
  createLogger(name: string, context: LogContext = {}): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const extra: LogContext = { ...context, logger: name };
    return {
      trace: (...args: unknown[]) => this.log('trace', args, extra),
      debug: (...args: unknown[]) => this.log('debug', args, extra),
      info: (...args: unknown[]) => this.log('info', args, extra),
      warn: (...args: unknown[]) => this.log('warn', args, extra),
      error: (...args: unknown[]) => this.log('error', args, extra),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

let sharedLogger: Logger | null = null;

/**
 * Process-wide logger used when a component is not handed one explicitly.
 */
export function getSharedLogger(): Logger {
  if (!sharedLogger) {
    sharedLogger = new Logger();
    sharedLogger.setLogFormat(['timestamp', 'level', 'logger', 'device']);
  }
  return sharedLogger;
}

export default Logger;
