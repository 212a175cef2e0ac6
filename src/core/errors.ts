import { CommanderError } from "commander";

export type CliOutputFormat = "text" | "json";

export type JournalErrorCode = "VALIDATION" | "CONFIG" | "SERVICE_UNAVAILABLE" | "EXECUTION";

/** Input and configuration problems exit with 2, operational failures with 1. */
const EXIT_CODES: Record<JournalErrorCode, number> = {
  VALIDATION: 2,
  CONFIG: 2,
  SERVICE_UNAVAILABLE: 1,
  EXECUTION: 1
};

export interface JournalErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class JournalError extends Error {
  abstract readonly code: JournalErrorCode;
  readonly details: Record<string, unknown> | undefined;

  protected constructor(message: string, options: JournalErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options.details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /** True when running the same command again may succeed without changes. */
  get retryable(): boolean {
    return this.code === "SERVICE_UNAVAILABLE";
  }
}

/** Missing required form input. The user corrects it and resubmits. */
export class ValidationError extends JournalError {
  readonly code = "VALIDATION";

  constructor(message: string, options: JournalErrorOptions = {}) {
    super(message, options);
  }
}

/** Missing or rejected credentials, unknown model, invalid settings. Needs operator action. */
export class FatalConfigError extends JournalError {
  readonly code = "CONFIG";

  constructor(message: string, options: JournalErrorOptions = {}) {
    super(message, options);
  }
}

/** Network, rate-limit or malformed-response failure. */
export class TransientServiceError extends JournalError {
  readonly code = "SERVICE_UNAVAILABLE";

  constructor(message: string, options: JournalErrorOptions = {}) {
    super(message, options);
  }
}

export class ExecutionError extends JournalError {
  readonly code = "EXECUTION";

  constructor(message: string, options: JournalErrorOptions = {}) {
    super(message, options);
  }
}

export function normalizeError(error: unknown): JournalError {
  if (error instanceof JournalError) return error;
  if (error instanceof CommanderError) {
    return new ValidationError(error.message, { cause: error, details: { commanderCode: error.code } });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExecutionError(message, { cause: error });
}

export function normalizeOutputFormat(value: string | undefined): CliOutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new ValidationError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

/** Used when commander failed before options were parsed. */
export function resolveOutputFormatFromArgv(argv: readonly string[]): CliOutputFormat {
  const index = argv.findIndex((token) => token === "--format" || token.startsWith("--format="));
  if (index === -1) return "text";

  const token = argv[index] ?? "";
  const value = token === "--format" ? argv[index + 1] : token.slice("--format=".length);
  return value?.trim().toLowerCase() === "json" ? "json" : "text";
}

export function toJsonErrorPayload(error: JournalError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      retryable: error.retryable,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
