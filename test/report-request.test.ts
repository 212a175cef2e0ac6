import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/core/errors.js";
import { buildReportRequest } from "../src/core/request.js";
import type { MediaAttachment } from "../src/core/types.js";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

const photo: MediaAttachment = { path: "/tmp/a.jpg", name: "a.jpg", kind: "image", sizeBytes: 10 };

describe("buildReportRequest", () => {
  it("rejects an empty project name even when activities are present", () => {
    expect(() => buildReportRequest({ projectName: "", activitiesDescription: "Taught two classes." })).toThrow(
      ValidationError
    );
  });

  it("rejects a whitespace-only project name before checking activities", () => {
    const error = captureError(() => buildReportRequest({ projectName: "   ", activitiesDescription: "" }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ details: { field: "projectName" } });
  });

  it("rejects a missing activities description", () => {
    expect(() => buildReportRequest({ projectName: "project 1", activitiesDescription: " \n " })).toThrow(
      "Describe what you have done so far"
    );
  });

  it("trims fields, drops blank questions and keeps question order", () => {
    const request = buildReportRequest({
      projectName: "  project 1 ",
      activitiesDescription: " Cleaned the community well. ",
      verifyingQuestions: ["  Who joined you? ", "", "   ", "What changed?"],
      visitDate: " 2026-10-18 ",
      visitObjectives: "   ",
      attachments: [photo, photo]
    });

    expect(request).toEqual({
      projectName: "project 1",
      activitiesDescription: "Cleaned the community well.",
      verifyingQuestions: ["Who joined you?", "What changed?"],
      attachmentCount: 2,
      visitDate: "2026-10-18"
    });
    expect("visitObjectives" in request).toBe(false);
  });

  it("allows an empty question list and returns a frozen value", () => {
    const request = buildReportRequest({ projectName: "project 2", activitiesDescription: "Planted saplings." });
    expect(request.verifyingQuestions).toEqual([]);
    expect(request.attachmentCount).toBe(0);
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.verifyingQuestions)).toBe(true);
  });
});
