import { GoogleGenAI } from "@google/genai";

import { TransientServiceError } from "../errors.js";
import type { CompletionRequest, ReportModelClient } from "./contracts.js";
import { withRequestScope } from "./request-scope.js";

/**
 * Gemini-backed completion. A fresh client is created per call so the latest
 * key is always used and nothing outlives the request.
 */
export function createGeminiClient(): ReportModelClient {
  return {
    async complete(request: CompletionRequest): Promise<string> {
      return withRequestScope(request.timeoutMs, async (signal) => {
        const ai = new GoogleGenAI({ apiKey: request.apiKey });
        const response = await ai.models.generateContent({
          model: request.model,
          contents: request.prompt,
          config: {
            temperature: request.temperature,
            maxOutputTokens: request.maxOutputTokens,
            abortSignal: signal
          }
        });

        const text = response.text;
        if (typeof text !== "string" || !text.trim()) {
          throw new TransientServiceError(`${request.model} returned an empty or malformed response.`);
        }
        return text;
      });
    }
  };
}
