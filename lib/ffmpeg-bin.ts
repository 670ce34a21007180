import { existsSync } from "node:fs";
import path from "node:path";
import { execFileSync } from "node:child_process";

import { ConfigurationError } from "@/lib/errors";

const resolvedPaths = new Map<string, string>();

function isExecutablePath(candidate: string): boolean {
  if (!candidate) return false;
  if (candidate.includes(path.sep)) {
    return existsSync(candidate);
  }

  try {
    execFileSync(candidate, ["-version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

/**
 * Needed only by strategies that convert the downloaded stream to mp3.
 * A configured binary is used as given; otherwise ffmpeg is looked up on PATH.
 */
export function getFfmpegBinaryPath(configured?: string): string {
  const key = configured ?? "";
  const cached = resolvedPaths.get(key);
  if (cached) {
    return cached;
  }

  const candidate = configured || (process.platform === "win32" ? "ffmpeg.exe" : "ffmpeg");

  if (!isExecutablePath(candidate)) {
    throw new ConfigurationError(
      configured
        ? `FFmpeg not found at ${configured} (FFMPEG_BIN)`
        : "FFmpeg not found. Set FFMPEG_BIN or install ffmpeg to use strategies that extract mp3 audio."
    );
  }

  resolvedPaths.set(key, candidate);
  return candidate;
}
