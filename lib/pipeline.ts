import { generateDescription, type TextGenerator } from "@/lib/description";
import { ConfigurationError, errorMessage, MissingCredentialsError } from "@/lib/errors";
import { type PromptTemplates, resolveChannelStyle } from "@/lib/prompts";
import type { SessionStore } from "@/lib/session-store";
import { removeFile } from "@/lib/storage";
import { transcribeAudio, type SpeechTranslator } from "@/lib/transcription";
import type { AcquiredAudio, JobRecord, JobStage } from "@/lib/types";
import { normalizeVideoUrl } from "@/lib/youtube";

export const CONFIGURATION_ERROR_STATUS = "Configuration error - check API keys";

const STAGE_ERROR_PREFIX: Partial<Record<JobStage, string>> = {
  downloading: "Download error",
  transcribing: "Translation error",
  generating: "Description generation error",
};

export interface PipelineBackends {
  translator: SpeechTranslator;
  generator: TextGenerator;
}

export type AudioAcquirer = (params: {
  url: string;
  videoId?: string;
  onTitle: (title: string) => void;
  log: (message: string) => void;
}) => Promise<AcquiredAudio>;

export interface PipelineDependencies {
  store: SessionStore;
  outputDir: string;
  /** Throws ConfigurationError when credentials are missing. */
  resolveBackends: () => PipelineBackends;
  loadTemplates: () => PromptTemplates;
  acquireAudio: AudioAcquirer;
  removeFile?: (filePath: string) => Promise<void>;
}

/**
 * Runs Downloading → Transcribing → Generating for each job as one
 * fire-and-forget task. The first failure is recorded on the job and ends it.
 */
export class JobPipeline {
  private readonly running = new Map<string, Promise<void>>();

  constructor(private readonly deps: PipelineDependencies) {}

  get store(): SessionStore {
    return this.deps.store;
  }

  startJob(input: { url: string; channel: string }): JobRecord {
    const normalized = normalizeVideoUrl(input.url);
    const job = this.deps.store.create({
      url: normalized.url,
      requestedChannel: input.channel,
      channelStyle: resolveChannelStyle(input.channel),
    });
    const { sessionId } = job;

    console.info(`[job:${sessionId}] [created] ${job.url} (${job.channelStyle})`);

    const task = new Promise<void>((resolve) => setTimeout(resolve, 0))
      .then(() => this.runJob(sessionId, normalized.videoId))
      .finally(() => {
        this.running.delete(sessionId);
      });
    this.running.set(sessionId, task);

    return job;
  }

  /** Resolves once the job's task has finished; immediately for unknown or finished jobs. */
  whenSettled(sessionId: string): Promise<void> {
    return this.running.get(sessionId) ?? Promise.resolve();
  }

  get activeCount(): number {
    return this.running.size;
  }

  private log(sessionId: string, message: string) {
    this.deps.store.appendLog(sessionId, message);
    const stage = this.deps.store.get(sessionId)?.stage ?? "created";
    console.info(`[job:${sessionId}] [${stage}] ${message}`);
  }

  private enterStage(sessionId: string, stage: JobStage, status: string, progress: number) {
    this.deps.store.update(sessionId, { stage, status, progress });
    this.log(sessionId, status);
  }

  private async cleanup(sessionId: string, audioFilePath: string) {
    try {
      await (this.deps.removeFile ?? removeFile)(audioFilePath);
    } catch (error) {
      console.warn(`[job:${sessionId}] could not remove ${audioFilePath}: ${errorMessage(error)}`);
    }
  }

  private fail(sessionId: string, error: unknown) {
    const job = this.deps.store.get(sessionId);
    if (!job) return;

    const message = errorMessage(error);

    if (error instanceof MissingCredentialsError) {
      this.deps.store.update(sessionId, {
        stage: "failed",
        status: CONFIGURATION_ERROR_STATUS,
        error: `Configuration error: ${message}`,
      });
    } else {
      const prefix =
        error instanceof ConfigurationError ? "Configuration error" : STAGE_ERROR_PREFIX[job.stage] ?? "Pipeline error";
      this.deps.store.update(sessionId, {
        stage: "failed",
        status: "Error occurred",
        error: `${prefix}: ${message}`,
      });
    }

    this.deps.store.appendLog(sessionId, `Processing stopped: ${message}`);
    console.error(`[job:${sessionId}] [failed] ${job.error ?? message}`);
  }

  private async runJob(sessionId: string, videoId?: string): Promise<void> {
    const { store } = this.deps;
    const job = store.get(sessionId);
    if (!job) return;

    const log = (message: string) => this.log(sessionId, message);
    let audioFilePath: string | undefined;

    try {
      const backends = this.deps.resolveBackends();
      const templates = this.deps.loadTemplates();

      this.enterStage(sessionId, "downloading", "Downloading audio...", 10);
      const audio = await this.deps.acquireAudio({
        url: job.url,
        videoId,
        log,
        onTitle: (title) => {
          store.update(sessionId, { videoTitle: title, progress: 30 });
        },
      });

      audioFilePath = audio.audioFilePath;
      store.update(sessionId, {
        videoTitle: audio.title,
        audioFilePath,
        strategyUsed: audio.strategy.name,
        progress: 50,
      });
      log(`Audio saved to ${audioFilePath} using strategy ${audio.strategy.name}`);

      this.enterStage(sessionId, "transcribing", "Translating audio to English...", 60);
      const transcript = await transcribeAudio({
        audioFilePath,
        safeTitle: audio.safeTitle,
        outputDir: this.deps.outputDir,
        translator: backends.translator,
        log,
      });
      store.update(sessionId, { transcriptFilePath: transcript.transcriptFilePath, progress: 80 });

      this.enterStage(sessionId, "generating", "Generating description...", 90);
      const description = await generateDescription({
        srt: transcript.srt,
        channel: job.channelStyle,
        srtFilePath: transcript.transcriptFilePath,
        generator: backends.generator,
        templates,
        log,
      });
      store.update(sessionId, { descriptionFilePath: description.descriptionFilePath });

      this.enterStage(sessionId, "completed", "Completed", 100);
    } catch (error) {
      this.fail(sessionId, error);
    } finally {
      if (audioFilePath) {
        await this.cleanup(sessionId, audioFilePath);
      }
    }
  }
}
