export interface JournalConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxOutputTokens: number;
  projects: string[];
}
