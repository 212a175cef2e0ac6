export interface CompletionRequest {
  apiKey: string;
  model: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

/** One blocking text completion. Implementations throw on any failure. */
export interface ReportModelClient {
  complete(request: CompletionRequest): Promise<string>;
}

export type StatusCallback = (message: string) => void;
