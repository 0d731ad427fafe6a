/**
 * Leveled console logger shared by the engine and the CLI.
 *
 * Lines read `[level] (context) message key=value ...`. The engine logs
 * through a silent instance unless a caller hands one in.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "success";

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  silent?: boolean;
  colors?: boolean;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, success: 1, warn: 2, error: 3 };

const TAGS: Record<LogLevel, { label: string; color: string }> = {
  debug: { label: "debug", color: "\x1b[90m" },
  info: { label: "info", color: "\x1b[34m" },
  success: { label: "ok", color: "\x1b[32m" },
  warn: { label: "warn", color: "\x1b[33m" },
  error: { label: "error", color: "\x1b[31m" },
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly silent: boolean;
  private readonly useColors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? "debug" : "info");
    this.context = options.context ?? "";
    this.silent = options.silent ?? false;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  success(message: string, fields?: LogFields): void {
    this.write("success", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
    });
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (this.silent || RANK[level] < RANK[this.level]) {
      return;
    }

    const line = this.render(level, message, fields);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private render(level: LogLevel, message: string, fields?: LogFields): string {
    const { label, color } = TAGS[level];
    const tag = this.useColors ? `${color}[${label}]${RESET}` : `[${label}]`;
    const context = !this.context ? "" : this.useColors ? ` ${DIM}(${this.context})${RESET}` : ` (${this.context})`;
    return `${tag}${context} ${message}${renderFields(fields)}`;
  }
}

function renderFields(fields?: LogFields): string {
  if (!fields) {
    return "";
  }
  return Object.entries(fields)
    .map(([key, value]) => ` ${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join("");
}

export function createLogger(context: string, options: Omit<LoggerOptions, "context"> = {}): Logger {
  return new Logger({ ...options, context });
}

export const silentLogger = new Logger({ silent: true, colors: false });
