import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * What the engine needs from a logger. Hosts may pass their own.
 */
export interface PatchLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  type?: string;
  level?: LogLevel;
  timestamps?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger implements PatchLogger {
  protected type: string;
  protected level: LogLevel;
  protected timestamps: boolean;

  constructor(optionsOrType?: LoggerOptions | string) {
    const options =
      typeof optionsOrType === "string"
        ? { type: optionsOrType }
        : optionsOrType || {};
    this.type = options.type || "VDFPATCH";
    this.level = options.level || "info";
    this.timestamps = options.timestamps !== false;
  }

  public setLevel(level: LogLevel) {
    this.level = level;
  }

  public enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  public debug(message: string, ...args: unknown[]) {
    this.write("debug", chalk.gray(message), args);
  }

  public info(message: string, ...args: unknown[]) {
    this.write("info", message, args);
  }

  public warn(message: string, ...args: unknown[]) {
    this.write("warn", chalk.yellow(message), args);
  }

  public error(message: string, ...args: unknown[]) {
    this.write("error", chalk.red(message), args);
  }

  /**
   * Logger with the same settings and a different type tag
   */
  public child(type: string): Logger {
    return new Logger({
      type,
      level: this.level,
      timestamps: this.timestamps
    });
  }

  private write(level: LogLevel, message: string, args: unknown[]) {
    if (!this.enabled(level)) return;

    const tag = chalk.cyan(`[${this.type}]`);
    const prefix = this.timestamps
      ? `${chalk.dim(`[${new Date().toLocaleTimeString()}]`)} ${tag}`
      : tag;

    if (level === "error") {
      console.error(prefix, message, ...args);
    } else {
      console.log(prefix, message, ...args);
    }
  }
}

export const logger = new Logger();
