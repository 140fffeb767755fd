import { EventEmitter } from 'events';
import crypto from 'crypto';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ReplyLogEntry {
  id: string;
  timestamp: string;
  scope: string;
  level: LogLevel;
  event: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface ReplyLoggerOptions {
  maxLogsPerScope?: number;
  logLevel?: LogLevel;
  echo?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
};

// Keys whose values carry message content
const CONTENT_KEYS = ['body', 'text', 'replytext', 'senttext', 'generatedtext'];

const EMAIL_ADDRESS = /\b([A-Za-z0-9._%+-])[A-Za-z0-9._%+-]*@([A-Za-z0-9.-]+\.[A-Za-z]{2,})\b/g;

export const GLOBAL_SCOPE = 'engine';

export class ReplyLogger extends EventEmitter {
  private logs: Map<string, ReplyLogEntry[]> = new Map();
  private maxLogsPerScope: number;
  private logLevel: LogLevel;
  private echo: boolean;

  constructor(options: ReplyLoggerOptions = {}) {
    super();
    this.maxLogsPerScope = options.maxLogsPerScope || 500;
    this.logLevel = options.logLevel || 'info';
    this.echo = options.echo ?? process.env.NODE_ENV !== 'test';
  }

  /**
   * Record a pipeline event for a scope (usually a sender address)
   */
  log(scope: string, entry: Omit<ReplyLogEntry, 'id' | 'timestamp' | 'scope'>): void {
    if (LOG_LEVELS[entry.level] < LOG_LEVELS[this.logLevel]) {
      return;
    }

    // "2025-01-11T10:16:42Z"
    const timestamp = new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
    const key = this.sanitizeString(scope.toLowerCase());

    const logEntry: ReplyLogEntry = this.sanitizeLogEntry({
      ...entry,
      id: crypto.randomUUID(),
      timestamp,
      scope: key
    });

    const scopeLogs = this.logs.get(key) || [];
    scopeLogs.push(logEntry);
    if (scopeLogs.length > this.maxLogsPerScope) {
      scopeLogs.shift();
    }
    this.logs.set(key, scopeLogs);

    if (this.echo) {
      this.print(logEntry);
    }

    this.emit('log', logEntry);
    this.emit(`log:${key}`, logEntry);
  }

  debug(scope: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(scope, { level: 'debug', event, message, data });
  }

  info(scope: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(scope, { level: 'info', event, message, data });
  }

  warn(scope: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(scope, { level: 'warn', event, message, data });
  }

  error(scope: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(scope, { level: 'error', event, message, data });
  }

  getLogs(scope: string, limit?: number): ReplyLogEntry[] {
    const scopeLogs = this.logs.get(this.sanitizeString(scope.toLowerCase())) || [];
    if (limit && limit > 0) {
      return scopeLogs.slice(-limit);
    }
    return [...scopeLogs];
  }

  clearLogs(scope: string): void {
    this.logs.delete(this.sanitizeString(scope.toLowerCase()));
    this.emit('logs-cleared', { scope });
  }

  getLogCount(scope: string): number {
    return this.logs.get(this.sanitizeString(scope.toLowerCase()))?.length || 0;
  }

  private print(entry: ReplyLogEntry): void {
    const color = LEVEL_COLORS[entry.level];
    const line = `${chalk.dim(entry.timestamp)} ${color(entry.level.toUpperCase())} [${entry.event}] ${entry.message}`;
    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private sanitizeLogEntry(entry: ReplyLogEntry): ReplyLogEntry {
    const sanitized = { ...entry, message: this.sanitizeString(entry.message) };
    if (entry.data) {
      sanitized.data = this.sanitizeRecord(entry.data);
    }
    return sanitized;
  }

  /**
   * Mask addresses down to their first character and domain
   */
  private sanitizeString(str: string): string {
    return str.replace(EMAIL_ADDRESS, '$1***@$2');
  }

  private sanitizeRecord(record: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
      if (CONTENT_KEYS.includes(key.toLowerCase()) && typeof value === 'string') {
        sanitized[key] = `[${value.length} chars redacted]`;
      } else {
        sanitized[key] = this.sanitizeValue(value);
      }
    }
    return sanitized;
  }

  private sanitizeValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.sanitizeString(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.sanitizeValue(item));
    }
    if (isRecord(value)) {
      return this.sanitizeRecord(value);
    }
    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
