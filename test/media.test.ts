import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ValidationError } from "../src/core/errors.js";
import { describeAttachments } from "../src/core/media.js";

describe("describeAttachments", () => {
  let workDir = "";

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "karma-journal-media-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("lists photos and videos with their sizes", async () => {
    await writeFile(join(workDir, "visit.JPG"), "abc");
    await writeFile(join(workDir, "clip.mp4"), "12345");

    const attachments = await describeAttachments(["visit.JPG", " ", "clip.mp4"], workDir);

    expect(attachments).toEqual([
      { path: join(workDir, "visit.JPG"), name: "visit.JPG", kind: "image", sizeBytes: 3 },
      { path: join(workDir, "clip.mp4"), name: "clip.mp4", kind: "video", sizeBytes: 5 }
    ]);
  });

  it("rejects unsupported file types", async () => {
    await writeFile(join(workDir, "notes.pdf"), "pdf");
    await expect(describeAttachments(["notes.pdf"], workDir)).rejects.toThrow(
      'Unsupported media file "notes.pdf". Allowed: .png, .jpg, .jpeg, .mp4, .mov, .avi.'
    );
  });

  it("rejects missing files and directories", async () => {
    await mkdir(join(workDir, "album.png"));
    await expect(describeAttachments(["missing.png"], workDir)).rejects.toThrow("Media file not found: missing.png");
    await expect(describeAttachments(["album.png"], workDir)).rejects.toThrow(ValidationError);
  });
});
