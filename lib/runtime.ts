import { acquireAudio } from "@/lib/audio";
import { type AppConfig, getConfig } from "@/lib/config";
import { GeminiTextGenerator } from "@/lib/description";
import { loadDownloadStrategies } from "@/lib/download-strategies";
import { MissingCredentialsError } from "@/lib/errors";
import { JobPipeline, type PipelineBackends } from "@/lib/pipeline";
import { loadPromptTemplates, type PromptTemplates } from "@/lib/prompts";
import { SessionStore } from "@/lib/session-store";
import { WhisperTranslator } from "@/lib/transcription";
import { createYtDlpExec } from "@/lib/ytdlp";

declare global {
  // eslint-disable-next-line no-var
  var __descriptionPipeline: JobPipeline | undefined;
}

function createBackendResolver(config: AppConfig): () => PipelineBackends {
  let backends: PipelineBackends | null = null;

  return () => {
    if (backends) return backends;

    if (!config.openaiApiKey) {
      throw new MissingCredentialsError("OPENAI_API_KEY not found in environment variables. Set it in the .env file.");
    }

    if (!config.geminiApiKey) {
      throw new MissingCredentialsError("GEMINI_API_KEY not found in environment variables. Set it in the .env file.");
    }

    console.info("[runtime] Initialising transcription and generation clients");
    backends = {
      translator: new WhisperTranslator({ apiKey: config.openaiApiKey, model: config.whisperModel }),
      generator: new GeminiTextGenerator({ apiKey: config.geminiApiKey, model: config.geminiModel }),
    };

    return backends;
  };
}

function createTemplateLoader(config: AppConfig): () => PromptTemplates {
  let templates: PromptTemplates | null = null;

  return () => {
    if (!templates) {
      templates = loadPromptTemplates(config.promptsDir);
    }

    return templates;
  };
}

export function createPipeline(config: AppConfig): JobPipeline {
  const exec = createYtDlpExec(config.ytDlpBin);

  return new JobPipeline({
    store: new SessionStore({ ttlMs: config.sessionTtlMs }),
    outputDir: config.outputDir,
    resolveBackends: createBackendResolver(config),
    loadTemplates: createTemplateLoader(config),
    acquireAudio: ({ url, videoId, onTitle, log }) =>
      acquireAudio({
        url,
        videoId,
        strategies: loadDownloadStrategies(config.strategiesFile),
        onTitle,
        log,
        deps: {
          exec,
          outputDir: config.outputDir,
          cookiesFile: config.cookiesFile,
          ffmpegBin: config.ffmpegBin,
          downloadApiUrl: config.downloadApiUrl,
          downloadApiTimeoutMs: config.downloadApiTimeoutMs,
        },
      }),
  });
}

/** One pipeline per process, shared by every route module. */
export function getPipeline(): JobPipeline {
  if (!globalThis.__descriptionPipeline) {
    globalThis.__descriptionPipeline = createPipeline(getConfig());
  }

  return globalThis.__descriptionPipeline;
}
