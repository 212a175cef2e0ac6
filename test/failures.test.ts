import { describe, expect, it } from "vitest";

import { classifyServiceError } from "../src/core/ai/failures.js";
import { ExecutionError, FatalConfigError, TransientServiceError } from "../src/core/errors.js";

function apiError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("classifyServiceError", () => {
  it("treats rejected credentials as fatal configuration errors", () => {
    const error = classifyServiceError(apiError("Unauthorized", 401), "gemini-test");
    expect(error).toBeInstanceOf(FatalConfigError);
    expect(error.details).toEqual({ status: 401, model: "gemini-test" });
    expect(classifyServiceError(apiError("Forbidden", 403), "gemini-test")).toBeInstanceOf(FatalConfigError);
  });

  it("treats an invalid key reported as bad request as fatal", () => {
    const error = classifyServiceError(apiError("API key not valid. Please pass a valid API key.", 400), "gemini-test");
    expect(error).toBeInstanceOf(FatalConfigError);
    expect(error.message).toBe(
      "The model API rejected the configured credentials (API key not valid. Please pass a valid API key.)."
    );
  });

  it("treats an unknown model as fatal", () => {
    const error = classifyServiceError(apiError("models/nope is not found", 404), "nope");
    expect(error).toBeInstanceOf(FatalConfigError);
    expect(error.message).toBe('Model "nope" is not available for this API key (models/nope is not found).');
  });

  it("treats rate limiting and server errors as transient", () => {
    const limited = classifyServiceError(apiError("Resource exhausted", 429), "gemini-test");
    expect(limited).toBeInstanceOf(TransientServiceError);
    expect(limited.message).toBe("Rate limited by the model API. Wait a minute and try again (Resource exhausted).");

    const unavailable = classifyServiceError(apiError("Service Unavailable", 503), "gemini-test");
    expect(unavailable).toBeInstanceOf(TransientServiceError);
    expect(unavailable.message).toBe("The model API request failed with HTTP 503 (Service Unavailable).");
  });

  it("treats network failures as transient", () => {
    const error = classifyServiceError(new TypeError("fetch failed"), "gemini-test");
    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error.message).toBe("Could not reach the model API (fetch failed).");
    expect(error.details).toEqual({ model: "gemini-test" });
  });

  it("passes already classified errors through", () => {
    const original = new TransientServiceError("timed out");
    expect(classifyServiceError(original, "gemini-test")).toBe(original);
  });

  it("reclassifies other internal errors as transient with the same message", () => {
    const error = classifyServiceError(new ExecutionError("unexpected payload"), "gemini-test");
    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error.message).toBe("unexpected payload");
  });
});
