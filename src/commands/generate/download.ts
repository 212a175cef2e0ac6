import { spinner } from "@clack/prompts";

import { writeReportFile } from "../../core/write.js";

interface SaveJournalReportOptions {
  targetDir: string;
  displayPath: string;
  fileName: string;
  reportText: string;
  force: boolean;
  quiet: boolean;
}

export async function saveJournalReport(options: SaveJournalReportOptions): Promise<string> {
  const saveSpinner = options.quiet ? null : spinner();
  saveSpinner?.start(`Saving ${options.fileName} in \`${options.displayPath}\`...`);

  try {
    const savedPath = await writeReportFile(options.targetDir, options.fileName, options.reportText, {
      force: options.force
    });
    saveSpinner?.stop(`Saved ${options.fileName}.`);
    return savedPath;
  } catch (error) {
    saveSpinner?.stop("Could not save the report.", 2);
    throw error;
  }
}
