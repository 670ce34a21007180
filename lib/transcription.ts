import { createReadStream, promises as fs } from "node:fs";
import OpenAI from "openai";

import { errorMessage, TranscriptionFailure } from "@/lib/errors";
import { getArtifactPaths } from "@/lib/storage";
import { countWords, srtToPlainText } from "@/lib/subtitles";

export const MAX_OPENAI_UPLOAD_BYTES = 25 * 1024 * 1024;

/** Speech-to-text backend that answers in English SRT whatever the spoken language. */
export interface SpeechTranslator {
  translateToSrt(audioFilePath: string): Promise<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export class WhisperTranslator implements SpeechTranslator {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(params: { apiKey: string; model: string; client?: OpenAI }) {
    this.client = params.client ?? new OpenAI({ apiKey: params.apiKey });
    this.model = params.model;
  }

  async translateToSrt(audioFilePath: string): Promise<string> {
    const response: unknown = await this.client.audio.translations.create({
      model: this.model,
      file: createReadStream(audioFilePath),
      response_format: "srt",
    });

    if (typeof response === "string") return response;
    if (isRecord(response) && typeof response.text === "string") return response.text;

    throw new Error("Translation endpoint returned an unexpected payload");
  }
}

export interface TranscriptResult {
  transcriptFilePath: string;
  srt: string;
}

/** Translates the audio to English SRT and writes `{safeTitle}.srt` into the output directory. */
export async function transcribeAudio(params: {
  audioFilePath: string;
  safeTitle: string;
  outputDir: string;
  translator: SpeechTranslator;
  log?: (message: string) => void;
}): Promise<TranscriptResult> {
  const { audioFilePath, safeTitle, outputDir, translator, log } = params;

  let size: number;
  try {
    size = (await fs.stat(audioFilePath)).size;
  } catch (error) {
    throw new TranscriptionFailure(`Audio file is not readable: ${audioFilePath}`, { cause: error });
  }

  if (size > MAX_OPENAI_UPLOAD_BYTES) {
    const sizeMb = (size / (1024 * 1024)).toFixed(1);
    throw new TranscriptionFailure(`Audio file is ${sizeMb} MB; the translation endpoint accepts at most 25 MB`);
  }

  log?.(`Sending ${audioFilePath} to the translation endpoint`);

  let srt: string;
  try {
    srt = await translator.translateToSrt(audioFilePath);
  } catch (error) {
    throw new TranscriptionFailure(errorMessage(error, "Translation request failed"), { cause: error });
  }

  if (!srt.trim()) {
    throw new TranscriptionFailure("Translation endpoint returned an empty transcript");
  }

  const { transcriptPath } = getArtifactPaths(outputDir, safeTitle);
  try {
    await fs.writeFile(transcriptPath, srt, "utf8");
  } catch (error) {
    throw new TranscriptionFailure(`Could not save transcript to ${transcriptPath}`, { cause: error });
  }

  log?.(`Transcript saved to ${transcriptPath} (${countWords(srtToPlainText(srt))} words)`);

  return { transcriptFilePath: transcriptPath, srt };
}
