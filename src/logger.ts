// src/logger.ts - Leveled logger shared by the pipeline stages
//
// Levels: silent < error < warn < info < debug < trace
//
//   const log = createLogger({ name: 'calcline', level: 'debug' });
//   log.debug('reduced', { nodes: 3 });
//   const t = log.time('parse'); ... t.end();

import { performance } from 'perf_hooks';

export const logLevels = [
  'silent',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
] as const;
export type LogLevel = (typeof logLevels)[number];

export interface LogSink {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
}

export interface LoggerOptions {
  name?: string; // prefix
  level?: LogLevel;
  // Defaults to console
  sink?: LogSink;
  timestamp?: boolean;
  // Append the JSON payload after the message when one is given
  includePayload?: boolean;
}

export interface Timer {
  end: (payload?: unknown) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const consoleSink: LogSink = {
  error: (msg) => console.error(msg),
  warn: (msg) => console.warn(msg),
  info: (msg) => console.log(msg),
  debug: (msg) => console.debug(msg),
};

export class Logger {
  private readonly name: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? 'calcline';
    this.level = options.level ?? 'warn';
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;
    this.sink = options.sink ?? consoleSink;
  }

  private isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  error(msg: string, payload?: unknown): void {
    this.emit('error', msg, payload);
  }

  warn(msg: string, payload?: unknown): void {
    this.emit('warn', msg, payload);
  }

  info(msg: string, payload?: unknown): void {
    this.emit('info', msg, payload);
  }

  debug(msg: string, payload?: unknown): void {
    this.emit('debug', msg, payload);
  }

  trace(msg: string, payload?: unknown): void {
    this.emit('trace', msg, payload);
  }

  /**
   * Returns a child logger sharing level and sink, with a dotted name.
   */
  child(name: string): Logger {
    return new Logger({
      name: `${this.name}.${name}`,
      level: this.level,
      sink: this.sink,
      timestamp: this.timestamp,
      includePayload: this.includePayload,
    });
  }

  time(label: string): Timer {
    const start = performance.now();
    this.debug(`start ${label}`);
    return {
      end: (payload?: unknown) => {
        const ms = performance.now() - start;
        this.debug(`end ${label} (${ms.toFixed(2)}ms)`, payload);
      },
    };
  }

  private emit(
    level: Exclude<LogLevel, 'silent'>,
    msg: string,
    payload?: unknown
  ): void {
    if (!this.isEnabled(level)) return;
    const line = this.formatLine(level, msg, payload);
    if (level === 'error') this.sink.error(line);
    else if (level === 'warn') this.sink.warn(line);
    else if (level === 'info') this.sink.info(line);
    else this.sink.debug(line); // debug and trace
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const ts = this.timestamp ? `${isoTime()} ` : '';
    const head = `${ts}[${this.name}] ${level.toUpperCase()}: ${msg}`;
    if (payload === undefined || !this.includePayload) {
      return head;
    }
    return `${head} ${safeStringify(payload)}`;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export function safeStringify(value: unknown): string {
  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return '[unserializable]';
  }
}

// compact ISO without ms
function isoTime(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Process-wide default, used by components created without a logger.
 */
export const rootLogger = createLogger();
