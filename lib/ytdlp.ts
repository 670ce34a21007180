import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { getFfmpegBinaryPath } from "@/lib/ffmpeg-bin";
import type { YtDlpStrategy } from "@/lib/types";

const execFileAsync = promisify(execFile);

const PYTHON_ARGS_PREFIX = ["-W", "ignore", "-m", "yt_dlp"];
const DEFAULT_AUDIO_FORMAT = "bestaudio[ext=m4a]/bestaudio";

interface YtDlpCommand {
  command: string;
  argsPrefix: string[];
}

export interface YtDlpOutput {
  stdout: string;
  stderr: string;
}

/** Runs yt-dlp with the given arguments. Swapped out in tests. */
export type YtDlpExec = (args: string[], workingDirectory: string) => Promise<YtDlpOutput>;

export interface YtDlpInfo {
  id?: string;
  title?: string;
  duration?: number;
  uploader?: string;
  webpage_url?: string;
}

export interface StrategyArgsOptions {
  cookiesFile?: string;
  ffmpegBin?: string;
}

let commandPromise: Promise<YtDlpCommand> | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return "";
}

export function parseJsonFromOutput(raw: string): YtDlpInfo {
  const firstBrace = raw.indexOf("{");
  if (firstBrace < 0) {
    throw new Error("yt-dlp returned no metadata");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(firstBrace));
  } catch {
    throw new Error("Could not parse the metadata JSON returned by yt-dlp");
  }

  if (!isRecord(parsed)) {
    throw new Error("yt-dlp metadata is not an object");
  }

  return {
    id: typeof parsed.id === "string" ? parsed.id : undefined,
    title: typeof parsed.title === "string" ? parsed.title : undefined,
    duration: typeof parsed.duration === "number" ? parsed.duration : undefined,
    uploader: typeof parsed.uploader === "string" ? parsed.uploader : undefined,
    webpage_url: typeof parsed.webpage_url === "string" ? parsed.webpage_url : undefined,
  };
}

function normalizeYtDlpError(error: unknown): Error {
  if (error instanceof Error) {
    const stderr = "stderr" in error ? toText(error.stderr).trim() : "";
    const stdout = "stdout" in error ? toText(error.stdout).trim() : "";
    const realOutput = stderr || stdout;

    if (realOutput) {
      return new Error(`yt-dlp failed: ${realOutput}`);
    }

    if (error.message) {
      return new Error(`yt-dlp failed: ${error.message}`);
    }
  }

  return new Error("yt-dlp failed with an unknown error");
}

async function canRun(command: string, args: string[]): Promise<boolean> {
  try {
    await execFileAsync(command, args, { encoding: "utf8", windowsHide: true, maxBuffer: 1024 * 1024 });
    return true;
  } catch {
    return false;
  }
}

async function resolveYtDlpCommand(configuredBin?: string): Promise<YtDlpCommand> {
  if (configuredBin) {
    return { command: configuredBin, argsPrefix: [] };
  }

  if (await canRun("yt-dlp", ["--version"])) {
    return { command: "yt-dlp", argsPrefix: [] };
  }

  const python = process.platform === "win32" ? "python" : "python3";
  if (await canRun(python, [...PYTHON_ARGS_PREFIX, "--version"])) {
    return { command: python, argsPrefix: [...PYTHON_ARGS_PREFIX] };
  }

  throw new Error("yt-dlp executable not found. Install yt-dlp or set YTDLP_BIN.");
}

function getYtDlpCommand(configuredBin?: string): Promise<YtDlpCommand> {
  if (!commandPromise) {
    commandPromise = resolveYtDlpCommand(configuredBin).catch((error: unknown) => {
      commandPromise = null;
      throw error;
    });
  }

  return commandPromise;
}

export function createYtDlpExec(configuredBin?: string): YtDlpExec {
  return async (args, workingDirectory) => {
    const runner = await getYtDlpCommand(configuredBin);

    try {
      const result = await execFileAsync(runner.command, [...runner.argsPrefix, ...args], {
        cwd: workingDirectory,
        encoding: "utf8",
        windowsHide: true,
        maxBuffer: 32 * 1024 * 1024,
      });

      return { stdout: result.stdout, stderr: result.stderr };
    } catch (error) {
      throw normalizeYtDlpError(error);
    }
  };
}

/** Client identity, headers, skip flags and cookies for one strategy. */
export function buildStrategyArgs(strategy: YtDlpStrategy, options: StrategyArgsOptions = {}): string[] {
  const extractorArgs = [`player_client=${strategy.playerClient}`];
  if (strategy.skip && strategy.skip.length > 0) {
    extractorArgs.push(`player_skip=${strategy.skip.join(",")}`);
  }

  const args = [
    "--ignore-config",
    "--no-playlist",
    "--no-warnings",
    "--extractor-args",
    `youtube:${extractorArgs.join(";")}`,
  ];

  if (strategy.userAgent) {
    args.push("--user-agent", strategy.userAgent);
  }

  for (const [name, value] of Object.entries(strategy.headers ?? {})) {
    args.push("--add-header", `${name}:${value}`);
  }

  if (strategy.useCookies && options.cookiesFile) {
    args.push("--cookies", options.cookiesFile);
  }

  return args;
}

export async function fetchVideoInfo(params: {
  exec: YtDlpExec;
  url: string;
  strategy: YtDlpStrategy;
  workingDirectory: string;
  options?: StrategyArgsOptions;
}): Promise<YtDlpInfo> {
  const { exec, url, strategy, workingDirectory, options } = params;
  const { stdout } = await exec(
    [...buildStrategyArgs(strategy, options), "--dump-single-json", "--skip-download", url],
    workingDirectory
  );

  return parseJsonFromOutput(stdout);
}

/** Downloads the audio stream and returns the final path yt-dlp reports, if any. */
export async function downloadAudioStream(params: {
  exec: YtDlpExec;
  url: string;
  strategy: YtDlpStrategy;
  outputTemplate: string;
  workingDirectory: string;
  options?: StrategyArgsOptions;
}): Promise<string | null> {
  const { exec, url, strategy, outputTemplate, workingDirectory, options } = params;

  const args = [
    ...buildStrategyArgs(strategy, options),
    "--newline",
    "-f",
    strategy.format ?? DEFAULT_AUDIO_FORMAT,
    "--output",
    outputTemplate,
  ];

  if (strategy.extractAudio === "mp3") {
    args.push("-x", "--audio-format", "mp3", "--ffmpeg-location", getFfmpegBinaryPath(options?.ffmpegBin));
  }

  args.push("--print", "after_move:filepath", url);

  const { stdout } = await exec(args, workingDirectory);

  const printed = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  return printed.at(-1) ?? null;
}
