export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  NOT_FOUND: 7,
  CONFIG_ERROR: 10,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export const ErrorCode = {
  UNKNOWN: "unknown_error",
  INPUT_NOT_FOUND: "input_not_found",
  UNKNOWN_GROUP_COLUMN: "unknown_group_column",
  UNSUPPORTED_FORMAT: "unsupported_format",
  CONFIG_INVALID: "config_invalid",
  INVALID_STATE: "invalid_state",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface StructuredError {
  error: {
    code: ErrorCodeValue;
    message: string;
    exitCode: ExitCodeValue;
    details?: Record<string, unknown>;
    hint?: string;
    cause?: string;
  };
}

export interface AnalysisErrorOptions {
  code?: ErrorCodeValue;
  exitCode?: ExitCodeValue;
  details?: Record<string, unknown>;
  hint?: string;
  cause?: unknown;
}

export class AnalysisError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: ExitCodeValue;
  readonly details?: Record<string, unknown>;
  readonly hint?: string;

  constructor(message: string, options: AnalysisErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AnalysisError";
    this.code = options.code ?? ErrorCode.UNKNOWN;
    this.exitCode = options.exitCode ?? ExitCode.ERROR;
    this.details = options.details;
    this.hint = options.hint;
  }

  toJSON(): StructuredError {
    return {
      error: {
        code: this.code,
        message: this.message,
        exitCode: this.exitCode,
        ...(this.details ? { details: this.details } : {}),
        ...(this.hint ? { hint: this.hint } : {}),
        ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
      },
    };
  }

  format(useColors = true): string {
    const red = useColors ? "\x1b[31m" : "";
    const dim = useColors ? "\x1b[2m" : "";
    const reset = useColors ? "\x1b[0m" : "";

    let output = `${red}Error:${reset} ${this.message}`;

    if (this.hint) {
      output += `\n${dim}Hint: ${this.hint}${reset}`;
    }

    if (this.details && Object.keys(this.details).length > 0) {
      const detailsStr = Object.entries(this.details)
        .map(([key, value]) => `  ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`)
        .join("\n");
      output += `\n${dim}Details:\n${detailsStr}${reset}`;
    }

    return output;
  }
}

export class InputNotFoundError extends AnalysisError {
  constructor(path: string, cause?: unknown) {
    super(`Input file '${path}' does not exist.`, {
      code: ErrorCode.INPUT_NOT_FOUND,
      exitCode: ExitCode.NOT_FOUND,
      details: { path },
      cause,
    });
    this.name = "InputNotFoundError";
  }
}

export class UnknownGroupColumnError extends AnalysisError {
  readonly columns: string[];

  constructor(columns: string[], header: string[]) {
    const quoted = columns.map((column) => `'${column}'`).join(", ");
    super(`Group-by column ${quoted} not found in header.`, {
      code: ErrorCode.UNKNOWN_GROUP_COLUMN,
      exitCode: ExitCode.MISUSE,
      details: { available: header },
    });
    this.name = "UnknownGroupColumnError";
    this.columns = columns;
  }
}

export class UnsupportedFormatError extends AnalysisError {
  constructor(format: string) {
    super(`Unsupported input format '${format}'.`, {
      code: ErrorCode.UNSUPPORTED_FORMAT,
      exitCode: ExitCode.MISUSE,
      hint: "Use one of: csv, tsv, jsonl, xlsx, parquet.",
    });
    this.name = "UnsupportedFormatError";
  }
}

export class ConfigError extends AnalysisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, {
      code: ErrorCode.CONFIG_INVALID,
      exitCode: ExitCode.CONFIG_ERROR,
      details: issues.length > 0 ? { issues } : undefined,
      cause,
    });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class AnalysisStateError extends AnalysisError {
  constructor(message: string) {
    super(message, { code: ErrorCode.INVALID_STATE });
    this.name = "AnalysisStateError";
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
