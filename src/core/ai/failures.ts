import { FatalConfigError, JournalError, TransientServiceError } from "../errors.js";
import type { ReportFailure } from "../types.js";

const INVALID_KEY_PATTERN = /api[_ ]?key|permission|unauthenticated|credential/i;

function readHttpStatus(error: unknown): number | undefined {
  if (!error || typeof error !== "object" || !("status" in error)) return undefined;
  const { status } = error;
  return typeof status === "number" ? status : undefined;
}

export function summarizeFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const compact = message.replace(/\s+/g, " ").trim() || "unknown error";
  return compact.length > 280 ? `${compact.slice(0, 280)}...` : compact;
}

/**
 * Sorts a model-call failure into the two outcomes the caller can act on:
 * fix the configuration, or try again later.
 */
export function classifyServiceError(error: unknown, model: string): ReportFailure {
  if (error instanceof FatalConfigError || error instanceof TransientServiceError) return error;

  const summary = summarizeFailure(error);
  const status = readHttpStatus(error);
  const details = status !== undefined ? { status, model } : { model };

  if (status === 401 || status === 403 || (status === 400 && INVALID_KEY_PATTERN.test(summary))) {
    return new FatalConfigError(`The model API rejected the configured credentials (${summary}).`, {
      cause: error,
      details
    });
  }

  if (status === 404) {
    return new FatalConfigError(`Model "${model}" is not available for this API key (${summary}).`, {
      cause: error,
      details
    });
  }

  if (status === 429) {
    return new TransientServiceError(`Rate limited by the model API. Wait a minute and try again (${summary}).`, {
      cause: error,
      details
    });
  }

  if (status !== undefined) {
    return new TransientServiceError(`The model API request failed with HTTP ${status} (${summary}).`, {
      cause: error,
      details
    });
  }

  if (error instanceof JournalError) {
    return new TransientServiceError(error.message, { cause: error, details });
  }

  return new TransientServiceError(`Could not reach the model API (${summary}).`, {
    cause: error,
    details
  });
}
