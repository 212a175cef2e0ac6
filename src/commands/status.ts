import { log } from "@clack/prompts";

import { loadJournalConfig } from "../core/config.js";
import { normalizeOutputFormat } from "../core/errors.js";
import { maskSecret } from "../core/text.js";
import type { StatusCommandOptions } from "../core/types.js";

export function runStatus(options: StatusCommandOptions, version: string): void {
  const format = normalizeOutputFormat(options.format);
  const config = loadJournalConfig({ model: options.model, timeoutSec: options.timeoutSec });

  if (format === "json") {
    console.log(
      JSON.stringify(
        {
          version,
          node: process.version,
          apiKeyConfigured: Boolean(config.apiKey),
          model: config.model,
          timeoutMs: config.timeoutMs,
          temperature: config.temperature,
          maxOutputTokens: config.maxOutputTokens,
          projects: config.projects
        },
        null,
        2
      )
    );
    return;
  }

  log.info(`karma-journal v${version} on Node.js ${process.version}`);
  log.info(`Model: ${config.model} (temperature ${config.temperature}, max ${config.maxOutputTokens} tokens)`);
  log.info(`Request timeout: ${config.timeoutMs / 1000}s, single attempt`);
  log.info(`Projects: ${config.projects.join(", ")}`);
  if (config.apiKey) {
    log.success(`API key: ${maskSecret(config.apiKey)}`);
  } else {
    log.warn("API key: not set. Add GOOGLE_API_KEY (or GEMINI_API_KEY) to your environment.");
  }
}
