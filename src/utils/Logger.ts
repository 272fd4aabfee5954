/**
 * Simple structured logger with consistent formatting.
 * Supports log levels, filtering, custom sinks, module-prefixed output,
 * and lightweight duration measurement for pipeline stages.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Parse a level name (`debug`, `info`, `warn`, `error`, case-insensitive).
 * Returns null for anything else.
 */
export function parseLogLevel(name: string | undefined): LogLevel | null {
  if (!name) return null;
  const key = name.trim().toLowerCase();
  return Object.hasOwn(LEVEL_NAMES, key) ? LEVEL_NAMES[key] : null;
}

// In Vite, import.meta.env.DEV is true during development and testing
const isDev = import.meta.env?.DEV === true;
const envLevel = parseLogLevel(import.meta.env?.VITE_LOG_LEVEL);

let currentLevel: LogLevel = envLevel ?? (isDev ? LogLevel.DEBUG : LogLevel.WARN);
let currentSink: LogSink = defaultSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum log level globally. Messages below this level are suppressed. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  /** Replace the default console output with a custom sink. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink;
  }

  debug(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.DEBUG) return;
    currentSink(LogLevel.DEBUG, `[${this.module}]`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.INFO) return;
    currentSink(LogLevel.INFO, `[${this.module}]`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.WARN) return;
    currentSink(LogLevel.WARN, `[${this.module}]`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    currentSink(LogLevel.ERROR, `[${this.module}]`, message, ...args);
  }

  /**
   * Start timing a stage. The returned function logs
   * `<label> took <n>ms` at debug level and returns the elapsed milliseconds.
   */
  time(label: string): () => number {
    const start = performance.now();
    return () => {
      const elapsed = performance.now() - start;
      this.debug(`${label} took ${elapsed.toFixed(1)}ms`);
      return elapsed;
    };
  }
}
