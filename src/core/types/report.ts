import type { FatalConfigError, TransientServiceError } from "../errors.js";
import type { MediaKind } from "./common.js";

export interface MediaAttachment {
  path: string;
  name: string;
  kind: MediaKind;
  sizeBytes: number;
}

export interface ReportRequest {
  readonly projectName: string;
  readonly activitiesDescription: string;
  readonly verifyingQuestions: readonly string[];
  /** Shown to the user only; never part of the prompt. */
  readonly attachmentCount: number;
  readonly visitDate?: string;
  readonly visitObjectives?: string;
}

export interface ReportFormFields {
  projectName?: string | undefined;
  activitiesDescription?: string | undefined;
  verifyingQuestions?: readonly string[] | undefined;
  visitDate?: string | undefined;
  visitObjectives?: string | undefined;
  attachments?: readonly MediaAttachment[] | undefined;
}

export interface ReportResult {
  reportText: string;
  generatedAt: Date;
  model: string;
}

export type ReportFailure = TransientServiceError | FatalConfigError;

export type ReportOutcome =
  | {
      ok: true;
      report: ReportResult;
    }
  | {
      ok: false;
      error: ReportFailure;
    };
