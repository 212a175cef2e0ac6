export type { GeneratorState, MediaKind } from "./types/common.js";
export type { JournalConfig } from "./types/config.js";
export type { GenerateCommandOptions, StatusCommandOptions } from "./types/generate.js";
export type {
  MediaAttachment,
  ReportFailure,
  ReportFormFields,
  ReportOutcome,
  ReportRequest,
  ReportResult
} from "./types/report.js";
