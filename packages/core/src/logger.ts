/**
 * Logger for the dev loop
 *
 * Human-readable coloured lines by default, JSON lines when
 * WASM_DEV_LOOP_JSON_LOGS=true.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  step?: string;
  command?: string;
  exit_code?: number | null;
  duration_ms?: number;
  method?: string;
  path?: string;
  status?: number;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  writer?: LogWriter;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: chalk.gray('[debug]'),
  info: chalk.blue('[info]'),
  warn: chalk.yellow('[warn]'),
  error: chalk.red('[error]'),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_PRIORITY;
}

const consoleWriter: LogWriter = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  private jsonFormat: boolean;
  private minLevel: LogLevel;
  private writer: LogWriter;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.WASM_DEV_LOOP_LOG_LEVEL;
    this.jsonFormat = options.json ?? process.env.WASM_DEV_LOOP_JSON_LOGS === 'true';
    this.minLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
    this.writer = options.writer ?? consoleWriter;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    if (this.jsonFormat) {
      return JSON.stringify(entry);
    }

    const ctx = entry.context;
    const contextParts: string[] = [];
    if (ctx) {
      if (ctx.step) contextParts.push(`step=${ctx.step}`);
      if (ctx.method) contextParts.push(ctx.method);
      if (ctx.path) contextParts.push(ctx.path);
      if (ctx.status !== undefined) contextParts.push(`status=${ctx.status}`);
      if (ctx.exit_code !== undefined && ctx.exit_code !== null) contextParts.push(`exit=${ctx.exit_code}`);
      if (ctx.duration_ms !== undefined) contextParts.push(`${ctx.duration_ms.toFixed(0)}ms`);
    }

    const contextStr = contextParts.length > 0 ? ` ${chalk.gray(contextParts.join(' '))}` : '';
    let result = `${LEVEL_PREFIX[entry.level]} ${entry.message}${contextStr}`;

    if (entry.error) {
      result += `\n  ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack && this.minLevel === 'debug') {
        result += `\n${entry.error.stack}`;
      }
    }

    return result;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.writer(level, this.formatEntry(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log('error', message, context, error);
  }

  setJsonFormat(enabled: boolean): void {
    this.jsonFormat = enabled;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getConfig(): { jsonFormat: boolean; minLevel: LogLevel } {
    return {
      jsonFormat: this.jsonFormat,
      minLevel: this.minLevel,
    };
  }
}

/**
 * Logger that drops everything, for embedding and tests
 */
export function silentLogger(): Logger {
  return new Logger({ level: 'error', writer: () => {} });
}
