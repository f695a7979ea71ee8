export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Context-scoped console logger
 *
 * Lines look like `2026-01-01T00:00:00.000Z [INFO] [amm:pool] message`.
 */
export class Logger {
  constructor(
    private readonly context: string = "amm",
    private readonly level: LogLevel = "info"
  ) {}

  private log(level: Exclude<LogLevel, "silent">, message: string, ...args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (level === "error") {
      console.error(line, ...args);
    } else if (level === "warn") {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log("warn", message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, ...args);
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.level);
  }

  getLevel(): LogLevel {
    return this.level;
  }
}
