export interface GenerateCommandOptions {
  project?: string;
  date?: string;
  objectives?: string;
  question?: string[];
  defaultQuestions?: boolean;
  activities?: string;
  media?: string[];
  model?: string;
  timeoutSec?: string;
  format?: string;
  stdoutOnly?: boolean;
  yes?: boolean;
  force?: boolean;
}

export interface StatusCommandOptions {
  model?: string;
  timeoutSec?: string;
  format?: string;
}
