import type { ReportRequest } from "../types.js";

const TARGET_WORD_COUNT = 500;

function formatQuestions(questions: readonly string[]): string[] {
  if (questions.length === 0) return ["- None provided."];
  return questions.map((question) => `- ${question}`);
}

export function buildJournalPrompt(request: ReportRequest): string {
  const lines = [
    "You are a social welfare expert helping a volunteer write up today's Karma Yoga field visit.",
    `Draft a reflective journal report of approximately ${TARGET_WORD_COUNT} words, written in the first person,`,
    "about the social welfare impact and the field activities. Follow this structure:",
    "",
    "1. The plan of action for today's field visit (date and time, objectives, goals and purpose of the visit).",
    "2. The activities carried out to complete the action plan.",
    "3. What you observed today that you would like to implement in your next field visit.",
    "4. The key learning outcomes from this field visit.",
    "",
    "Field visit details:",
    `- Project: ${request.projectName}`,
    `- Date of visit: ${request.visitDate ?? "No date provided"}`,
    `- Objectives, goals and purpose: ${request.visitObjectives ?? "Not provided"}`,
    "",
    "Questions from the verifying authority that the report must address:",
    ...formatQuestions(request.verifyingQuestions),
    "",
    "What the volunteer has done so far:",
    request.activitiesDescription,
    "",
    "Rules:",
    "- Keep the tone formal and empathetic, with relevant social welfare reflections.",
    "- Return only the journal entry text. Do not repeat these instructions."
  ];

  return lines.join("\n");
}
