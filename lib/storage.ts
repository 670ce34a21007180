import { promises as fs } from "node:fs";
import path from "node:path";

export interface ArtifactPaths {
  audioTemplate: string;
  audioPrefix: string;
  transcriptPath: string;
}

/**
 * Keeps letters, digits, spaces, hyphens and underscores, then trims trailing whitespace.
 * Titles that differ only in stripped characters map to the same name.
 */
export function sanitizeTitle(rawTitle: string): string {
  return Array.from(rawTitle)
    .filter((char) => /[\p{L}\p{N} _-]/u.test(char))
    .join("")
    .trimEnd();
}

export function getArtifactPaths(outputDir: string, safeTitle: string): ArtifactPaths {
  return {
    audioTemplate: path.join(outputDir, `${safeTitle}.%(ext)s`),
    audioPrefix: path.join(outputDir, safeTitle),
    transcriptPath: path.join(outputDir, `${safeTitle}.srt`),
  };
}

export function getDescriptionPath(transcriptPath: string): string {
  const { dir, name } = path.parse(transcriptPath);
  return path.join(dir, `${name}_description.txt`);
}

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await fs.mkdir(outputDir, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function hasContent(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

/** Best-effort delete; a failure is logged and otherwise ignored. */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[storage] Could not remove ${filePath}: ${message}`);
  }
}
