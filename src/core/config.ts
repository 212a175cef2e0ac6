import { z } from "zod";

import { FatalConfigError } from "./errors.js";
import { DEFAULT_PROJECTS } from "./prompts/constants.js";
import type { JournalConfig } from "./types.js";

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_TIMEOUT_SEC = 60;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_OUTPUT_TOKENS = 5000;
export const MISSING_API_KEY_MESSAGE = "API key not found. Set GOOGLE_API_KEY (or GEMINI_API_KEY) and try again.";

type Env = Record<string, string | undefined>;

interface ConfigOverrides {
  model?: string | undefined;
  timeoutSec?: string | undefined;
}

const rawConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z
    .string()
    .regex(/^[\w.\-/]+$/, "model id may only contain letters, digits, '.', '-', '_' and '/'")
    .optional(),
  timeoutSec: z.coerce.number().int().positive().max(600).optional(),
  projects: z.array(z.string().min(1)).min(1).optional()
});

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function splitList(value: string | undefined): string[] | undefined {
  const normalized = blankToUndefined(value);
  if (!normalized) return undefined;
  const items = normalized
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Resolves the effective configuration. Flags win over environment variables.
 * A missing API key is not an error here: the generator reports it before
 * making any network call, and `status` needs to show it as unset.
 */
export function loadJournalConfig(overrides: ConfigOverrides = {}, env: Env = process.env): JournalConfig {
  const parsed = rawConfigSchema.safeParse({
    apiKey: blankToUndefined(env.GOOGLE_API_KEY) ?? blankToUndefined(env.GEMINI_API_KEY),
    model: blankToUndefined(overrides.model) ?? blankToUndefined(env.KARMA_JOURNAL_MODEL),
    timeoutSec: blankToUndefined(overrides.timeoutSec) ?? blankToUndefined(env.KARMA_JOURNAL_TIMEOUT_SEC),
    projects: splitList(env.KARMA_JOURNAL_PROJECTS)
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new FatalConfigError(`Invalid configuration (${issues.join("; ")}).`, {
      details: { issues }
    });
  }

  const raw = parsed.data;
  return {
    ...(raw.apiKey ? { apiKey: raw.apiKey } : {}),
    model: raw.model ?? DEFAULT_MODEL,
    timeoutMs: (raw.timeoutSec ?? DEFAULT_TIMEOUT_SEC) * 1000,
    temperature: DEFAULT_TEMPERATURE,
    maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
    projects: raw.projects ?? [...DEFAULT_PROJECTS]
  };
}
