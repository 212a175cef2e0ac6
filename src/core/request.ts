import { ValidationError } from "./errors.js";
import type { ReportFormFields, ReportRequest } from "./types.js";

function clean(value: string | undefined): string {
  return value?.trim() ?? "";
}

function normalizeQuestions(questions: readonly string[] | undefined): string[] {
  if (!questions) return [];
  return questions.map((question) => question.trim()).filter((question) => question.length > 0);
}

/**
 * Builds the immutable value handed to the generator. Only the two required
 * fields are checked; project name first.
 */
export function buildReportRequest(fields: ReportFormFields): ReportRequest {
  const projectName = clean(fields.projectName);
  if (!projectName) {
    throw new ValidationError("Project name is required.", { details: { field: "projectName" } });
  }

  const activitiesDescription = clean(fields.activitiesDescription);
  if (!activitiesDescription) {
    throw new ValidationError("Describe what you have done so far before generating the report.", {
      details: { field: "activitiesDescription" }
    });
  }

  const visitDate = clean(fields.visitDate);
  const visitObjectives = clean(fields.visitObjectives);

  const request: ReportRequest = {
    projectName,
    activitiesDescription,
    verifyingQuestions: Object.freeze(normalizeQuestions(fields.verifyingQuestions)),
    attachmentCount: fields.attachments?.length ?? 0,
    ...(visitDate ? { visitDate } : {}),
    ...(visitObjectives ? { visitObjectives } : {})
  };

  return Object.freeze(request);
}
