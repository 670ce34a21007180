import path from "node:path";

import { downloadViaApi, type FetchLike } from "@/lib/download-api";
import { ensureOutputDir, getArtifactPaths, hasContent, removeFile, sanitizeTitle } from "@/lib/storage";
import { runStrategyChain } from "@/lib/strategy-chain";
import type { AcquiredAudio, DownloadStrategy, YtDlpStrategy } from "@/lib/types";
import { downloadAudioStream, fetchVideoInfo, type YtDlpExec } from "@/lib/ytdlp";

const AUDIO_EXTENSIONS = [".m4a", ".mp3", ".webm", ".opus", ".ogg"];

export interface AudioAcquisitionDeps {
  exec: YtDlpExec;
  fetchImpl?: FetchLike;
  outputDir: string;
  cookiesFile?: string;
  ffmpegBin?: string;
  downloadApiUrl?: string;
  downloadApiTimeoutMs: number;
}

interface AttemptResult {
  audioFilePath: string;
  title: string;
  safeTitle: string;
}

async function findAudioByPrefix(prefix: string): Promise<string | null> {
  for (const ext of AUDIO_EXTENSIONS) {
    const candidate = `${prefix}${ext}`;
    if (await hasContent(candidate)) return candidate;
  }

  return null;
}

/** Clears audio left under this title by earlier attempts or jobs. */
async function removeAudioByPrefix(prefix: string): Promise<void> {
  await Promise.all(AUDIO_EXTENSIONS.map((ext) => removeFile(`${prefix}${ext}`)));
}

async function attemptWithYtDlp(params: {
  url: string;
  strategy: YtDlpStrategy;
  deps: AudioAcquisitionDeps;
  fallbackTitle: string;
  onTitle?: (title: string) => void;
}): Promise<AttemptResult | null> {
  const { url, strategy, deps, fallbackTitle, onTitle } = params;
  const options = { cookiesFile: deps.cookiesFile, ffmpegBin: deps.ffmpegBin };

  const info = await fetchVideoInfo({ exec: deps.exec, url, strategy, workingDirectory: deps.outputDir, options });
  const title = info.title?.trim() || fallbackTitle;
  const safeTitle = sanitizeTitle(title) || fallbackTitle;
  onTitle?.(title);

  const paths = getArtifactPaths(deps.outputDir, safeTitle);
  await removeAudioByPrefix(paths.audioPrefix);

  const reported = await downloadAudioStream({
    exec: deps.exec,
    url,
    strategy,
    outputTemplate: paths.audioTemplate,
    workingDirectory: deps.outputDir,
    options,
  });

  const audioFilePath =
    reported && (await hasContent(path.resolve(deps.outputDir, reported)))
      ? path.resolve(deps.outputDir, reported)
      : await findAudioByPrefix(paths.audioPrefix);

  return audioFilePath ? { audioFilePath, title, safeTitle } : null;
}

/**
 * Runs the download strategies in order and returns the first local audio file produced.
 * `onTitle` fires as soon as a strategy learns the video title.
 */
export async function acquireAudio(params: {
  url: string;
  videoId?: string;
  strategies: readonly DownloadStrategy[];
  deps: AudioAcquisitionDeps;
  onTitle?: (title: string) => void;
  log?: (message: string) => void;
}): Promise<AcquiredAudio> {
  const { url, videoId, strategies, deps, onTitle, log } = params;
  const fallbackTitle = `audio-${videoId ?? Date.now()}`;

  await ensureOutputDir(deps.outputDir);

  const { result, strategy } = await runStrategyChain<DownloadStrategy, AttemptResult>({
    strategies,
    log,
    attempt: async (candidate) => {
      if (candidate.kind === "ytdlp") {
        return attemptWithYtDlp({ url, strategy: candidate, deps, fallbackTitle, onTitle });
      }

      const downloaded = await downloadViaApi({
        url,
        strategy: candidate,
        defaultEndpoint: deps.downloadApiUrl,
        defaultTimeoutMs: deps.downloadApiTimeoutMs,
        outputDir: deps.outputDir,
        fallbackTitle,
        fetchImpl: deps.fetchImpl,
        log,
      });
      onTitle?.(downloaded.title);

      if (await hasContent(downloaded.audioFilePath)) return downloaded;

      await removeFile(downloaded.audioFilePath);
      return null;
    },
  });

  return { ...result, strategy };
}
