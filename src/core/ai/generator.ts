import { MISSING_API_KEY_MESSAGE } from "../config.js";
import { FatalConfigError, TransientServiceError } from "../errors.js";
import type { GeneratorState, JournalConfig, ReportOutcome, ReportRequest } from "../types.js";
import type { ReportModelClient, StatusCallback } from "./contracts.js";
import { classifyServiceError } from "./failures.js";
import { createGeminiClient } from "./gemini-client.js";
import { buildJournalPrompt } from "./prompts.js";
import { stripBoilerplate } from "./response.js";
import { runWithLiveStatus } from "./task-shared.js";

export interface ReportGeneratorOptions {
  config: JournalConfig;
  client?: ReportModelClient;
  now?: () => Date;
  onStatus?: StatusCallback;
}

/**
 * Turns a report request into journal text with a single model call.
 * Failures come back as values; nothing is retried here.
 */
export class ReportGenerator {
  private readonly config: JournalConfig;
  private readonly client: ReportModelClient;
  private readonly now: () => Date;
  private readonly onStatus: StatusCallback | undefined;
  private currentState: GeneratorState = "idle";

  constructor(options: ReportGeneratorOptions) {
    this.config = options.config;
    this.client = options.client ?? createGeminiClient();
    this.now = options.now ?? (() => new Date());
    this.onStatus = options.onStatus;
  }

  get state(): GeneratorState {
    return this.currentState;
  }

  async generate(request: ReportRequest): Promise<ReportOutcome> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      return {
        ok: false,
        error: new FatalConfigError(MISSING_API_KEY_MESSAGE)
      };
    }

    if (this.currentState === "awaiting-response") {
      return {
        ok: false,
        error: new TransientServiceError("A report is already being generated. Wait for it to finish.")
      };
    }

    const model = this.config.model;
    this.onStatus?.("Building journal prompt...");
    const prompt = buildJournalPrompt(request);

    this.currentState = "awaiting-response";
    let raw: string;
    try {
      this.onStatus?.(`Sending request to ${model}...`);
      raw = await runWithLiveStatus(model, this.onStatus, () =>
        this.client.complete({
          apiKey,
          model,
          prompt,
          temperature: this.config.temperature,
          maxOutputTokens: this.config.maxOutputTokens,
          timeoutMs: this.config.timeoutMs
        })
      );
    } catch (error) {
      return { ok: false, error: classifyServiceError(error, model) };
    } finally {
      this.currentState = "idle";
    }

    this.onStatus?.("Response received. Cleaning up the draft...");
    const reportText = stripBoilerplate(raw, prompt);
    if (!reportText) {
      return {
        ok: false,
        error: new TransientServiceError(`${model} responded, but the response contained no report text.`, {
          details: { model }
        })
      };
    }

    return {
      ok: true,
      report: {
        reportText,
        generatedAt: this.now(),
        model
      }
    };
  }
}
