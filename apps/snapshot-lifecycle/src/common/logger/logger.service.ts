import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  invocationId?: string;
  data?: LogContext;
}

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const parseLevel = (raw: string | undefined): LogLevel => {
  const candidate = (raw || 'info').toLowerCase();
  return LEVELS.find((level) => level === candidate) ?? LogLevel.INFO;
};

const isLogContext = (value: unknown): value is LogContext =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Structured JSON logger service.
 *
 * Installed as the Nest application logger, so `new Logger(Name)` calls made by
 * services land here. Nest passes the logger context as the trailing string
 * parameter and, for `error`, a stack string before it.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly level: LogLevel;
  private readonly isProduction: boolean;
  private context?: string;
  private invocationId?: string;

  constructor(private readonly config: ConfigService) {
    this.level = parseLevel(this.config.get<string>('LOG_LEVEL'));
    this.isProduction = this.config.get<string>('NODE_ENV') === 'production';
  }

  setContext(context: string): this {
    this.context = context;
    return this;
  }

  /**
   * Tags subsequent entries with the provider's request id, so a run can be
   * followed through the log stream.
   */
  setInvocationId(invocationId: string | undefined): this {
    this.invocationId = invocationId;
    return this;
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.DEBUG, message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.DEBUG, message, optionalParams);
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.INFO, message, optionalParams);
  }

  info(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.INFO, message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.WARN, message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.ERROR, message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.ERROR, message, optionalParams);
  }

  private writeLog(level: LogLevel, message: unknown, params: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const { context, data } = this.splitParams(params);
    const entry: LogEntry = {
      level,
      message: typeof message === 'string' ? message : JSON.stringify(message),
      timestamp: new Date().toISOString(),
      ...((context || this.context) && { context: context || this.context }),
      ...(this.invocationId && { invocationId: this.invocationId }),
      ...(data && { data }),
    };

    if (this.isProduction) {
      process.stdout.write(`${JSON.stringify(entry)}\n`);
    } else {
      this.prettyPrint(entry);
    }
  }

  private splitParams(params: unknown[]): { context?: string; data?: LogContext } {
    const rest = [...params];
    let context: string | undefined;
    const last = rest[rest.length - 1];
    if (typeof last === 'string') {
      context = last;
      rest.pop();
    }

    let data: LogContext | undefined;
    for (const param of rest) {
      if (param instanceof Error) {
        data = { ...data, name: param.name, message: param.message, stack: param.stack };
      } else if (typeof param === 'string') {
        data = { ...data, stack: param };
      } else if (isLogContext(param)) {
        data = { ...data, ...param };
      }
    }

    return { context, data };
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private prettyPrint(entry: LogEntry): void {
    const { level, message, timestamp, context, invocationId, data } = entry;

    const prefix = [
      this.colorizeLevel(level),
      timestamp,
      context && `[${context}]`,
      invocationId && `req:${invocationId}`,
    ]
      .filter(Boolean)
      .join(' ');

    // eslint-disable-next-line no-console
    console.log(prefix, message);

    if (data && Object.keys(data).length > 0) {
      // eslint-disable-next-line no-console
      console.log('  ', JSON.stringify(data, null, 2));
    }
  }

  private colorizeLevel(level: LogLevel): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m', // cyan
      [LogLevel.INFO]: '\x1b[32m', // green
      [LogLevel.WARN]: '\x1b[33m', // yellow
      [LogLevel.ERROR]: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';
    return `${colors[level]}${level.toUpperCase()}${reset}`;
  }
}
