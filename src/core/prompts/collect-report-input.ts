import { confirm, log, outro, select, text } from "@clack/prompts";

import { buildReportRequest } from "../request.js";
import type { GenerateCommandOptions, JournalConfig, MediaAttachment, ReportRequest } from "../types.js";
import { OTHER_PROJECT_VALUE, STANDARD_QUESTIONS } from "./constants.js";
import { unwrapPrompt } from "./interaction.js";
import { matchProjectChoice, normalizeText, resolveQuestions, todayIsoDate } from "./normalization.js";

async function promptForProject(options: GenerateCommandOptions, projects: readonly string[]): Promise<string> {
  const explicitProject = normalizeText(options.project);
  const presetProject = matchProjectChoice(explicitProject, projects);
  const initialValue = presetProject ?? (explicitProject ? OTHER_PROJECT_VALUE : projects[0] ?? OTHER_PROJECT_VALUE);

  const selection = unwrapPrompt<string>(
    await select({
      message: "Select your Karma Yoga project",
      initialValue,
      options: [
        ...projects.map((project) => ({ value: project, label: project })),
        { value: OTHER_PROJECT_VALUE, label: "Other (type manually)" }
      ]
    })
  );
  if (selection !== OTHER_PROJECT_VALUE) return selection;

  const customDefault = presetProject ? "" : explicitProject ?? "";
  const customProject = unwrapPrompt<string>(
    await text({
      message: "Project name",
      placeholder: "e.g. Village literacy drive",
      defaultValue: customDefault,
      validate(value) {
        const resolved = value?.trim() || customDefault;
        if (!resolved) return "Project name is required.";
        return undefined;
      }
    })
  );
  return customProject.trim() || customDefault;
}

async function promptForExtraQuestions(initial: readonly string[]): Promise<string[]> {
  const questions = [...initial];
  for (;;) {
    const answer = unwrapPrompt<string>(
      await text({
        message: `Additional verifying authority question #${questions.length + 1} (leave empty to continue)`,
        placeholder: "e.g. How many families were reached?",
        defaultValue: ""
      })
    );
    const question = answer.trim();
    if (!question) return questions;
    questions.push(question);
  }
}

/**
 * Gathers the form fields, from flags with `--yes`, otherwise through
 * terminal prompts pre-filled from the flags. Either way the result goes
 * through the same presence checks.
 */
async function collectReportInput(
  options: GenerateCommandOptions,
  config: JournalConfig,
  attachments: readonly MediaAttachment[] = []
): Promise<ReportRequest> {
  if (options.yes) {
    return buildReportRequest({
      projectName: options.project,
      visitDate: options.date,
      visitObjectives: options.objectives,
      verifyingQuestions: resolveQuestions(options.defaultQuestions ?? true, options.question),
      activitiesDescription: options.activities,
      attachments
    });
  }

  const projectName = await promptForProject(options, config.projects);

  const defaultDate = normalizeText(options.date) ?? todayIsoDate();
  const visitDate = unwrapPrompt<string>(
    await text({
      message: "Date of the field visit",
      placeholder: defaultDate,
      defaultValue: defaultDate
    })
  );

  const defaultObjectives = normalizeText(options.objectives) ?? "";
  const visitObjectives = unwrapPrompt<string>(
    await text({
      message: "Objectives, goals and purpose of your visit",
      placeholder: defaultObjectives || "What did you set out to do today?",
      defaultValue: defaultObjectives
    })
  );

  const useStandardQuestions = unwrapPrompt<boolean>(
    await confirm({
      message: `Include the ${STANDARD_QUESTIONS.length} standard field-visit questions?`,
      initialValue: options.defaultQuestions ?? true
    })
  );
  const extraQuestions = await promptForExtraQuestions(options.question ?? []);

  const defaultActivities = normalizeText(options.activities) ?? "";
  const activitiesDescription = unwrapPrompt<string>(
    await text({
      message: "Describe what you have done so far",
      placeholder: defaultActivities || "Activities, people met, outcomes...",
      defaultValue: defaultActivities,
      validate(value) {
        const resolved = value?.trim() || defaultActivities;
        if (!resolved) return "Please describe your activities before generating the report.";
        return undefined;
      }
    })
  );

  if (attachments.length > 0) {
    log.info(`${attachments.length} media file(s) attached for your records; they are not sent to the model.`);
  }
  outro("Report details captured.");

  return buildReportRequest({
    projectName,
    visitDate,
    visitObjectives,
    verifyingQuestions: resolveQuestions(useStandardQuestions, extraQuestions),
    activitiesDescription: activitiesDescription.trim() || defaultActivities,
    attachments
  });
}

export { collectReportInput };
