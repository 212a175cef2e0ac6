import { describe, expect, it, vi } from "vitest";

import { ReportGenerator } from "../src/core/ai/generator.js";
import type { ReportModelClient } from "../src/core/ai/contracts.js";
import { buildJournalPrompt } from "../src/core/ai/prompts.js";
import { FatalConfigError, TransientServiceError } from "../src/core/errors.js";
import { buildReportRequest } from "../src/core/request.js";
import type { JournalConfig } from "../src/core/types.js";

const FIXED_NOW = new Date("2026-10-18T09:30:00.000Z");

function makeConfig(overrides: Partial<JournalConfig> = {}): JournalConfig {
  return {
    apiKey: "test-key",
    model: "gemini-test",
    timeoutMs: 1000,
    temperature: 0.7,
    maxOutputTokens: 5000,
    projects: ["project 1"],
    ...overrides
  };
}

function makeClient() {
  const complete = vi.fn<ReportModelClient["complete"]>();
  return { client: { complete }, complete };
}

const request = buildReportRequest({
  projectName: "project 1",
  activitiesDescription: "Served lunch at the community kitchen.",
  verifyingQuestions: ["How many people were served?"]
});

describe("ReportGenerator", () => {
  it("returns a ~500-word response without truncating it", async () => {
    const journal = Array.from({ length: 500 }, (_, index) => `word${index + 1}`).join(" ");
    const { client, complete } = makeClient();
    complete.mockResolvedValue(journal);

    const generator = new ReportGenerator({ config: makeConfig(), client, now: () => FIXED_NOW });
    const outcome = await generator.generate(request);

    expect(outcome).toEqual({
      ok: true,
      report: { reportText: journal, generatedAt: FIXED_NOW, model: "gemini-test" }
    });
  });

  it("sends the rendered prompt and generation settings in one call", async () => {
    const { client, complete } = makeClient();
    complete.mockResolvedValue("Today I served lunch.");

    const generator = new ReportGenerator({ config: makeConfig(), client });
    await generator.generate(request);

    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith({
      apiKey: "test-key",
      model: "gemini-test",
      prompt: buildJournalPrompt(request),
      temperature: 0.7,
      maxOutputTokens: 5000,
      timeoutMs: 1000
    });
  });

  it("fails with a config error before any network call when the API key is missing", async () => {
    const { apiKey: _unused, ...withoutKey } = makeConfig();
    const { client, complete } = makeClient();

    const generator = new ReportGenerator({ config: withoutKey, client });
    const outcome = await generator.generate(request);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(FatalConfigError);
    expect(complete).not.toHaveBeenCalled();
    expect(generator.state).toBe("idle");
  });

  it("returns a transient error on network failure and can be retried", async () => {
    const { client, complete } = makeClient();
    complete.mockRejectedValueOnce(new TypeError("fetch failed")).mockResolvedValueOnce("Second attempt worked.");

    const generator = new ReportGenerator({ config: makeConfig(), client });
    const first = await generator.generate(request);

    expect(first.ok).toBe(false);
    if (!first.ok) {
      expect(first.error).toBeInstanceOf(TransientServiceError);
      expect(first.error.message).toBe("Could not reach the model API (fetch failed).");
    }
    expect(generator.state).toBe("idle");

    const second = await generator.generate(request);
    expect(second.ok).toBe(true);
    if (second.ok) {
      expect(second.report.reportText).toBe("Second attempt worked.");
    }
  });

  it("never returns an empty success", async () => {
    const { client, complete } = makeClient();
    complete.mockResolvedValue("Sure, here is the report:\n\n");

    const generator = new ReportGenerator({ config: makeConfig(), client });
    const outcome = await generator.generate(request);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(TransientServiceError);
      expect(outcome.error.message).toBe("gemini-test responded, but the response contained no report text.");
    }
  });

  it("strips boilerplate around the report", async () => {
    const { client, complete } = makeClient();
    complete.mockResolvedValue("Here is your journal entry:\nToday I served lunch.\n\nI hope this helps!");

    const generator = new ReportGenerator({ config: makeConfig(), client, now: () => FIXED_NOW });
    const outcome = await generator.generate(request);

    expect(outcome.ok && outcome.report.reportText).toBe("Today I served lunch.");
  });

  it("tracks the awaiting state and rejects a second call while one is in flight", async () => {
    let resolveCompletion: (text: string) => void = () => undefined;
    const { client, complete } = makeClient();
    complete.mockImplementation(
      () =>
        new Promise<string>((resolve) => {
          resolveCompletion = resolve;
        })
    );

    const generator = new ReportGenerator({ config: makeConfig(), client });
    expect(generator.state).toBe("idle");

    const pending = generator.generate(request);
    expect(generator.state).toBe("awaiting-response");

    const concurrent = await generator.generate(request);
    expect(concurrent.ok).toBe(false);
    if (!concurrent.ok) {
      expect(concurrent.error.message).toBe("A report is already being generated. Wait for it to finish.");
    }

    resolveCompletion("Today I served lunch.");
    const outcome = await pending;
    expect(outcome.ok).toBe(true);
    expect(generator.state).toBe("idle");
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("reports progress through the status callback", async () => {
    const { client, complete } = makeClient();
    complete.mockResolvedValue("Today I served lunch.");
    const onStatus = vi.fn();

    const generator = new ReportGenerator({ config: makeConfig(), client, onStatus });
    await generator.generate(request);

    expect(onStatus).toHaveBeenCalledWith("Building journal prompt...");
    expect(onStatus).toHaveBeenCalledWith("Sending request to gemini-test...");
    expect(onStatus).toHaveBeenCalledWith("Response received. Cleaning up the draft...");
  });
});
