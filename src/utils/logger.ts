/**
 * Component logger.
 *
 * Format: [topicwire:<component>] LEVEL message | {"key":"value"}
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level: LogLevel;
  /** Prefix an ISO timestamp to every line */
  timestamps: boolean;
}

export interface LogSink {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const globalConfig: LoggerConfig = {
  level: parseLogLevel(process.env.TOPICWIRE_LOG_LEVEL) ?? 'info',
  timestamps: false,
};

let sink: LogSink = console;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

/**
 * Update the process-wide logging configuration.
 */
export function configure(config: Partial<LoggerConfig>): void {
  Object.assign(globalConfig, config);
}

/** Route log lines somewhere other than the console (tests, CLI output). */
export function setLogSink(next: LogSink): void {
  sink = next;
}

export class Logger {
  private readonly component: string;
  private readonly level?: LogLevel;

  constructor(component: string, options: { level?: LogLevel } = {}) {
    this.component = component;
    this.level = options.level;
  }

  debug(message: string, details?: Record<string, unknown>): void {
    this.write('debug', message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.write('info', message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    this.write('warn', message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    this.write('error', message, details);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level ?? globalConfig.level];
  }

  private write(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const ts = globalConfig.timestamps ? `${new Date().toISOString()} ` : '';
    const detailStr = details ? ` | ${JSON.stringify(details)}` : '';
    const line = `${ts}[topicwire:${this.component}] ${level.toUpperCase()} ${message}${detailStr}`;

    if (level === 'error') {
      sink.error(line);
    } else if (level === 'warn') {
      sink.warn(line);
    } else {
      sink.log(line);
    }
  }
}

export function createLogger(component: string, options: { level?: LogLevel } = {}): Logger {
  return new Logger(component, options);
}
