import { relative, resolve } from "node:path";

import { intro, log } from "@clack/prompts";

import type { ReportModelClient } from "../core/ai.js";
import { loadJournalConfig, MISSING_API_KEY_MESSAGE } from "../core/config.js";
import { ExecutionError, FatalConfigError, normalizeError, normalizeOutputFormat, ValidationError } from "../core/errors.js";
import { collectReportInput } from "../core/prompts.js";
import type { GenerateCommandOptions } from "../core/types.js";
import { assertReportFileAvailable, reportFileName } from "../core/write.js";
import { resolveAttachments } from "./generate/attachments.js";
import { saveJournalReport } from "./generate/download.js";
import { draftJournalReport } from "./generate/report.js";

interface RunGenerateDependencies {
  client?: ReportModelClient;
}

// JSON mode prints nothing but the error payload on failure, so the drafted text rides along in its details.
function unsavedReportError(error: unknown, reportText: string): ExecutionError {
  const normalized = normalizeError(error);
  return new ExecutionError(`Report generated but not saved: ${normalized.message}`, {
    cause: error,
    details: { ...normalized.details, reportText }
  });
}

function toDisplayPath(path: string): string {
  const rel = relative(process.cwd(), path);
  if (!rel || rel === "") return ".";
  return rel.startsWith("..") ? path : rel;
}

export async function runGenerate(
  pathArg: string | undefined,
  options: GenerateCommandOptions,
  dependencies: RunGenerateDependencies = {}
): Promise<void> {
  const format = normalizeOutputFormat(options.format);
  const quiet = format === "json";
  if (quiet && !options.yes) {
    throw new ValidationError("--format json needs --yes; interactive prompts cannot run in JSON mode.");
  }

  const config = loadJournalConfig({ model: options.model, timeoutSec: options.timeoutSec });
  if (!config.apiKey) {
    throw new FatalConfigError(MISSING_API_KEY_MESSAGE);
  }

  const targetDir = resolve(process.cwd(), pathArg ?? ".");
  if (!quiet) {
    intro("Karma Yoga Journal Report Generator");
  }

  const attachments = await resolveAttachments(options.media ?? [], quiet);
  const request = await collectReportInput(options, config, attachments);
  const fileName = reportFileName(request.projectName);
  if (!options.stdoutOnly && !options.force) {
    await assertReportFileAvailable(targetDir, fileName);
  }

  const report = await draftJournalReport(request, config, {
    quiet,
    ...(dependencies.client ? { client: dependencies.client } : {})
  });

  if (!quiet) {
    log.step("Draft Journal Report");
    console.log(`\n${report.reportText}\n`);
  }

  let savedPath: string | null = null;
  if (!options.stdoutOnly) {
    try {
      savedPath = await saveJournalReport({
        targetDir,
        displayPath: toDisplayPath(targetDir),
        fileName,
        reportText: report.reportText,
        force: options.force ?? false,
        quiet
      });
    } catch (error) {
      throw quiet ? unsavedReportError(error, report.reportText) : error;
    }
  }

  if (quiet) {
    console.log(
      JSON.stringify(
        {
          projectName: request.projectName,
          generatedAt: report.generatedAt.toISOString(),
          model: report.model,
          file: savedPath,
          attachmentCount: request.attachmentCount,
          reportText: report.reportText
        },
        null,
        2
      )
    );
    return;
  }

  if (savedPath) {
    log.success(`Report saved to \`${toDisplayPath(savedPath)}\`.`);
  } else {
    log.info("Skipped saving the report because --stdout-only was set.");
  }
}
