import { log } from "@clack/prompts";

import { describeAttachments } from "../../core/media.js";
import { formatFileSize } from "../../core/text.js";
import type { MediaAttachment } from "../../core/types.js";

export async function resolveAttachments(paths: readonly string[], quiet: boolean): Promise<MediaAttachment[]> {
  const attachments = await describeAttachments(paths);
  if (quiet || attachments.length === 0) return attachments;

  const lines = attachments.map(
    (attachment) => `${attachment.kind === "image" ? "photo" : "video"}  ${attachment.name} (${formatFileSize(attachment.sizeBytes)})`
  );
  log.message(["Uploaded files:", ...lines].join("\n"));
  return attachments;
}
