import { spinner } from "@clack/prompts";

import { ReportGenerator } from "../../core/ai.js";
import type { ReportModelClient } from "../../core/ai.js";
import { countWords } from "../../core/text.js";
import type { JournalConfig, ReportRequest, ReportResult } from "../../core/types.js";

interface DraftJournalReportOptions {
  quiet: boolean;
  client?: ReportModelClient;
}

export async function draftJournalReport(
  request: ReportRequest,
  config: JournalConfig,
  options: DraftJournalReportOptions
): Promise<ReportResult> {
  const generationSpinner = options.quiet ? null : spinner({ indicator: "dots" });
  generationSpinner?.start("Generating report...");

  const generator = new ReportGenerator({
    config,
    ...(options.client ? { client: options.client } : {}),
    ...(generationSpinner
      ? {
          onStatus(message: string) {
            generationSpinner.message(message);
          }
        }
      : {})
  });

  const outcome = await generator.generate(request);
  if (!outcome.ok) {
    generationSpinner?.stop("Report generation failed.", 2);
    throw outcome.error;
  }

  generationSpinner?.stop(
    `Draft received from ${outcome.report.model} (${countWords(outcome.report.reportText)} words).`
  );
  return outcome.report;
}
