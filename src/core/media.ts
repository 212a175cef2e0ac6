import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";

import { ValidationError } from "./errors.js";
import { SUPPORTED_MEDIA_EXTENSIONS, type SupportedMediaExtension } from "./prompts/constants.js";
import type { MediaAttachment } from "./types.js";

function isSupportedExtension(value: string): value is SupportedMediaExtension {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_MEDIA_EXTENSIONS, value);
}

async function describeAttachment(path: string, cwd: string): Promise<MediaAttachment> {
  const absolutePath = resolve(cwd, path);
  const extension = extname(absolutePath).toLowerCase();
  if (!isSupportedExtension(extension)) {
    const allowed = Object.keys(SUPPORTED_MEDIA_EXTENSIONS).join(", ");
    throw new ValidationError(`Unsupported media file "${basename(absolutePath)}". Allowed: ${allowed}.`, {
      details: { path }
    });
  }

  let stats: Stats;
  try {
    stats = await stat(absolutePath);
  } catch (error) {
    throw new ValidationError(`Media file not found: ${path}`, { cause: error, details: { path } });
  }
  if (!stats.isFile()) {
    throw new ValidationError(`Media path is not a file: ${path}`, { details: { path } });
  }

  return {
    path: absolutePath,
    name: basename(absolutePath),
    kind: SUPPORTED_MEDIA_EXTENSIONS[extension],
    sizeBytes: stats.size
  };
}

/**
 * Resolves uploaded photos and videos. Files are only stat'ed for display;
 * their contents are never read or sent anywhere.
 */
export async function describeAttachments(paths: readonly string[], cwd = process.cwd()): Promise<MediaAttachment[]> {
  const attachments: MediaAttachment[] = [];
  for (const path of paths) {
    const trimmed = path.trim();
    if (!trimmed) continue;
    attachments.push(await describeAttachment(trimmed, cwd));
  }
  return attachments;
}
