import path from "node:path";
import { z } from "zod";

import { ConfigurationError } from "@/lib/errors";

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const positiveInt = (fallback: number) =>
  optionalText.pipe(
    z
      .string()
      .regex(/^\d+$/, "must be a positive integer")
      .transform(Number)
      .refine((value) => value > 0, "must be greater than zero")
      .optional()
      .transform((value) => value ?? fallback)
  );

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  GEMINI_API_KEY: optionalText,
  OUTPUT_DIR: optionalText,
  YTDLP_BIN: optionalText,
  YTDLP_COOKIES_FILE: optionalText,
  DOWNLOAD_STRATEGIES_FILE: optionalText,
  DOWNLOAD_API_URL: optionalText.pipe(z.string().url().optional()),
  DOWNLOAD_API_TIMEOUT_MS: positiveInt(60_000),
  WHISPER_MODEL: optionalText,
  GEMINI_MODEL: optionalText,
  SESSION_TTL_MINUTES: positiveInt(24 * 60),
  FFMPEG_BIN: optionalText,
});

export interface AppConfig {
  openaiApiKey?: string;
  geminiApiKey?: string;
  outputDir: string;
  ytDlpBin?: string;
  cookiesFile?: string;
  strategiesFile: string;
  downloadApiUrl?: string;
  downloadApiTimeoutMs: number;
  whisperModel: string;
  geminiModel: string;
  sessionTtlMs: number;
  ffmpegBin?: string;
  promptsDir: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  let parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    console.warn(`[config] Ignoring invalid environment values, defaults apply: ${details}`);

    const invalidKeys = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
    parsed = envSchema.safeParse(
      Object.fromEntries(Object.entries(env).filter(([key]) => !invalidKeys.has(key)))
    );
  }

  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment configuration: ${parsed.error.message}`);
  }

  const values = parsed.data;

  return {
    openaiApiKey: values.OPENAI_API_KEY,
    geminiApiKey: values.GEMINI_API_KEY,
    outputDir: path.resolve(cwd, values.OUTPUT_DIR ?? path.join("storage", "output")),
    ytDlpBin: values.YTDLP_BIN,
    cookiesFile: values.YTDLP_COOKIES_FILE ? path.resolve(cwd, values.YTDLP_COOKIES_FILE) : undefined,
    strategiesFile: path.resolve(
      cwd,
      values.DOWNLOAD_STRATEGIES_FILE ?? path.join("config", "download-strategies.json")
    ),
    downloadApiUrl: values.DOWNLOAD_API_URL,
    downloadApiTimeoutMs: values.DOWNLOAD_API_TIMEOUT_MS,
    whisperModel: values.WHISPER_MODEL ?? "whisper-1",
    geminiModel: values.GEMINI_MODEL ?? "gemini-2.5-pro",
    sessionTtlMs: values.SESSION_TTL_MINUTES * 60_000,
    ffmpegBin: values.FFMPEG_BIN,
    promptsDir: path.join(cwd, "prompts"),
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }

  return cachedConfig;
}
