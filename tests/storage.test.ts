import { existsSync, writeFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { getArtifactPaths, getDescriptionPath, hasContent, removeFile, sanitizeTitle } from "@/lib/storage";
import { makeTempDir } from "./helpers";

describe("sanitizeTitle", () => {
  it("keeps letters, digits, spaces, hyphens and underscores", () => {
    expect(sanitizeTitle("iPhone 17: Unboxing & Review!")).toBe("iPhone 17 Unboxing  Review");
    expect(sanitizeTitle("Café_2024-final")).toBe("Café_2024-final");
  });

  it("trims trailing whitespace only", () => {
    expect(sanitizeTitle("  Hello world ?")).toBe("  Hello world");
  });

  it("maps titles that differ only in stripped characters to the same name", () => {
    expect(sanitizeTitle("A/B test")).toBe(sanitizeTitle("AB test"));
  });
});

describe("artifact paths", () => {
  it("derives the audio template and transcript path from the title", () => {
    expect(getArtifactPaths("/data/out", "My Video")).toEqual({
      audioTemplate: path.join("/data/out", "My Video.%(ext)s"),
      audioPrefix: path.join("/data/out", "My Video"),
      transcriptPath: path.join("/data/out", "My Video.srt"),
    });
  });

  it("puts the description next to the transcript", () => {
    expect(getDescriptionPath(path.join("/data/out", "My Video.srt"))).toBe(
      path.join("/data/out", "My Video_description.txt")
    );
  });
});

describe("file helpers", () => {
  it("reports empty and missing files as having no content", async () => {
    const dir = makeTempDir("storage");
    const empty = path.join(dir, "empty.m4a");
    const full = path.join(dir, "full.m4a");
    writeFileSync(empty, "");
    writeFileSync(full, "audio");

    expect(await hasContent(empty)).toBe(false);
    expect(await hasContent(full)).toBe(true);
    expect(await hasContent(path.join(dir, "missing.m4a"))).toBe(false);
  });

  it("removes files and tolerates missing ones", async () => {
    const dir = makeTempDir("storage");
    const target = path.join(dir, "audio.m4a");
    writeFileSync(target, "audio");

    await removeFile(target);
    await removeFile(target);

    expect(existsSync(target)).toBe(false);
  });
});
