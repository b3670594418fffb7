export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(prefix: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  prefix?: string;
  level?: LogLevel;
  timestamps?: boolean;
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private level: LogLevel;
  private timestamps: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? "[flakeproof]";
    this.level = options.level ?? "info";
    this.timestamps = options.timestamps ?? true;
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.debug(this.format("debug", message));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.info(this.format("info", message));
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(this.format("warn", message));
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled("error")) {
      return;
    }
    if (error instanceof Error && error.stack) {
      console.error(this.format("error", message), error.stack);
    } else {
      console.error(this.format("error", message));
    }
  }

  child(prefix: string): Logger {
    return new ConsoleLogger({
      prefix: `${this.prefix}${prefix}`,
      level: this.level,
      timestamps: this.timestamps,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(level: LogLevel, message: string): string {
    const head = `${this.prefix} [${level.toUpperCase()}] ${message}`;
    return this.timestamps ? `${new Date().toISOString()} ${head}` : head;
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

export const defaultLogger: Logger = new ConsoleLogger();

export function createLogger(level: LogLevel, prefix = "[flakeproof]"): Logger {
  if (level === "silent") {
    return silentLogger;
  }
  return new ConsoleLogger({ prefix, level });
}
