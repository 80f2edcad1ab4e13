/**
 * Structured Logger
 *
 * Leveled logging with pluggable sinks. Agents, tools and the registry obtain
 * a component logger instead of writing to the console, so the CLI can keep
 * stdout for streamed answers and send log lines to stderr.
 *
 * Usage:
 *   const log = createComponentLogger('ToolRegistry');
 *   log.info('Tool registered', { tool: 'file_read' });
 */

import chalk from 'chalk';

// ─── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: Date;
  level: Exclude<LogLevel, 'silent'>;
  /** Set for loggers created through `createComponentLogger` or `child` */
  component?: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  component?: string;
  /** Merged into the data of every entry */
  context?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// ─── Sinks ───────────────────────────────────────────────────────────

const LEVEL_COLORS: Record<LogEntry['level'], (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

function formatValue(value: unknown): string {
  return typeof value === 'string' && !/\s/.test(value) ? value : JSON.stringify(value);
}

export interface ConsoleSinkOptions {
  /** Defaults to process.stderr */
  output?: { write(text: string): unknown };
  /** Prefix each line with the time of day (the CLI turns this on for --debug) */
  timestamps?: boolean;
  /** Defaults to whether chalk detected color support */
  color?: boolean;
}

/**
 * One line per entry: `[time] LEVEL [component] message key=value ...`
 */
export class ConsoleSink implements LogSink {
  private output: { write(text: string): unknown };
  private timestamps: boolean;
  private color: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.timestamps = options.timestamps ?? false;
    this.color = options.color ?? chalk.level > 0;
  }

  format(entry: LogEntry): string {
    const level = entry.level.toUpperCase().padEnd(5);
    const parts = [
      ...(this.timestamps ? [entry.timestamp.toISOString().slice(11, 23)] : []),
      this.color ? LEVEL_COLORS[entry.level](level) : level,
      ...(entry.component ? [this.color ? chalk.bold(`[${entry.component}]`) : `[${entry.component}]`] : []),
      entry.message,
      ...Object.entries(entry.data ?? {}).map(([key, value]) => `${key}=${formatValue(value)}`),
    ];
    return parts.join(' ');
  }

  write(entry: LogEntry): void {
    this.output.write(`${this.format(entry)}\n`);
  }
}

/** Keeps the most recent entries for later inspection */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];

  constructor(private readonly maxSize = 1000) {}

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; component?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }
    if (filter?.component) {
      entries = entries.filter((e) => e.component === filter.component);
    }
    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  readonly level: LogLevel;
  readonly component?: string;
  private sinks: LogSink[];
  private context: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.component = config.component;
    this.context = config.context ?? {};
  }

  /** A logger for a component, sharing this logger's sinks and level */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ level: this.level, sinks: this.sinks, component, context: this.context });
  }

  /** A logger that adds `context` to the data of every entry */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.level,
      sinks: this.sinks,
      component: this.component,
      context: { ...this.context, ...context },
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) {
      return;
    }

    const merged = { ...this.context, ...data };
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      ...(this.component !== undefined && { component: this.component }),
      message,
      ...(Object.keys(merged).length > 0 && { data: merged }),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (error) {
        // Reported, never rethrown
        process.stderr.write(`log sink failed: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }
  }
}

// ─── Global instance ─────────────────────────────────────────────────

/**
 * Process-wide logger. Component loggers created before a call to
 * `configureLogger()` keep the sinks and level they were created with.
 */
export let logger = new StructuredLogger();

/**
 * Replace the global logger. The CLI calls this once configuration is loaded.
 */
export function configureLogger(config: LoggerConfig): StructuredLogger {
  logger = new StructuredLogger(config);
  return logger;
}

export function createComponentLogger(component: string): StructuredLogger {
  return logger.child(component);
}
