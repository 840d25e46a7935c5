/**
 * Logger accepted by every pipeline component. Library code logs through it
 * and never touches the console directly.
 */
export interface Logger {
  debug: (message: string, context?: object) => void;
  info: (message: string, context?: object) => void;
  warn: (message: string, context?: object) => void;
  error: (message: string, context?: object) => void;
}

/** Default logger: components stay silent unless a logger is injected. */
export class NullLogger implements Logger {
  debug() { /* no-op */ }
  info() { /* no-op */ }
  warn() { /* no-op */ }
  error() { /* no-op */ }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Writes `[scope] message` lines to the console, dropping anything below the
 * minimum level.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly scope: string;

  /**
   * @param options.level Minimum level written. Defaults to 'info'.
   * @param options.scope Tag printed in front of every line.
   */
  constructor(options: { level?: LogLevel; scope?: string } = {}) {
    this.minLevel = options.level ?? "info";
    this.scope = options.scope ?? "docqa";
  }

  /** Returns a logger sharing the level but tagged with another scope. */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({ level: this.minLevel, scope });
  }

  private log(level: LogLevel, message: string, context?: object) {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) {
      return;
    }

    const line = `[${this.scope}] ${message}`;
    const logMethod = console[level];
    if (context && Object.keys(context).length > 0) {
      logMethod(line, context);
    } else {
      logMethod(line);
    }
  }

  debug(message: string, context?: object) { this.log("debug", message, context); }
  info(message: string, context?: object) { this.log("info", message, context); }
  warn(message: string, context?: object) { this.log("warn", message, context); }
  error(message: string, context?: object) { this.log("error", message, context); }
}
