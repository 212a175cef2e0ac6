import { mkdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ValidationError } from "./errors.js";
import { toKebabCase } from "./text.js";

const FALLBACK_FILE_STEM = "karma-yoga";

export interface WriteReportOptions {
  force?: boolean;
}

function fsErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

function notADirectoryError(targetDir: string, cause: unknown): ValidationError {
  return new ValidationError(`Output path is not a directory: ${targetDir}`, {
    cause,
    details: { path: targetDir }
  });
}

function reportExistsError(targetDir: string, fileName: string, cause?: unknown): ValidationError {
  return new ValidationError(`${fileName} already exists in ${targetDir}. Use --force to overwrite it.`, {
    cause,
    details: { path: join(targetDir, fileName) }
  });
}

export function reportFileName(projectName: string): string {
  const stem = toKebabCase(projectName) || FALLBACK_FILE_STEM;
  return `${stem}-journal-report.txt`;
}

/** Fails early when saving would be refused, so no model call is spent on a report that cannot be written. */
export async function assertReportFileAvailable(targetDir: string, fileName: string): Promise<void> {
  try {
    await stat(join(targetDir, fileName));
  } catch (error) {
    const code = fsErrorCode(error);
    if (code === "ENOENT") return;
    if (code === "ENOTDIR") throw notADirectoryError(targetDir, error);
    throw error;
  }
  throw reportExistsError(targetDir, fileName);
}

export async function prepareTargetDirectory(targetDir: string): Promise<void> {
  try {
    await mkdir(targetDir, { recursive: true });
  } catch (error) {
    const code = fsErrorCode(error);
    if (code === "EEXIST" || code === "ENOTDIR") throw notADirectoryError(targetDir, error);
    throw error;
  }
  const targetStats = await stat(targetDir);
  if (!targetStats.isDirectory()) {
    throw notADirectoryError(targetDir, undefined);
  }
}

/** Writes the report text byte-for-byte; an existing file is kept unless `force` is set. */
export async function writeReportFile(
  targetDir: string,
  fileName: string,
  content: string,
  options: WriteReportOptions = {}
): Promise<string> {
  await prepareTargetDirectory(targetDir);
  const absolutePath = join(targetDir, fileName);
  try {
    await writeFile(absolutePath, content, { encoding: "utf8", flag: options.force ? "w" : "wx" });
  } catch (error) {
    if (fsErrorCode(error) === "EEXIST") {
      throw reportExistsError(targetDir, fileName, error);
    }
    throw error;
  }
  return absolutePath;
}
