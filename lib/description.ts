import { promises as fs } from "node:fs";
import { GoogleGenAI } from "@google/genai";

import { errorMessage, GenerationFailure, ValidationError } from "@/lib/errors";
import { buildPrompt, type PromptTemplates } from "@/lib/prompts";
import { getDescriptionPath } from "@/lib/storage";

export const MIN_TRANSCRIPT_CHARS = 50;

/** Generative backend that streams its answer in text chunks. */
export interface TextGenerator {
  streamText(prompt: string): AsyncIterable<string>;
}

export class GeminiTextGenerator implements TextGenerator {
  private readonly client: GoogleGenAI;
  private readonly model: string;

  constructor(params: { apiKey: string; model: string }) {
    this.client = new GoogleGenAI({ apiKey: params.apiKey });
    this.model = params.model;
  }

  async *streamText(prompt: string): AsyncIterable<string> {
    const stream = await this.client.models.generateContentStream({
      model: this.model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      config: {
        tools: [{ googleSearch: {} }],
      },
    });

    for await (const chunk of stream) {
      const text = chunk.text;
      if (text) yield text;
    }
  }
}

export interface DescriptionResult {
  descriptionFilePath: string;
  text: string;
}

export async function generateDescription(params: {
  srt: string;
  channel: string;
  srtFilePath: string;
  generator: TextGenerator;
  templates: PromptTemplates;
  log?: (message: string) => void;
}): Promise<DescriptionResult> {
  const { srt, channel, srtFilePath, generator, templates, log } = params;

  if (srt.trim().length < MIN_TRANSCRIPT_CHARS) {
    throw new ValidationError(
      `Transcript is too short (${srt.trim().length} chars); the file may be empty or corrupted`
    );
  }

  const prompt = buildPrompt(templates, channel, srt);
  log?.(`Prompt built for ${channel} (${prompt.length} chars)`);

  let text = "";
  try {
    for await (const chunk of generator.streamText(prompt)) {
      text += chunk;
    }
  } catch (error) {
    throw new GenerationFailure(errorMessage(error, "Generation request failed"), { cause: error });
  }

  if (!text.trim()) {
    throw new GenerationFailure("Generative backend returned no text");
  }

  const descriptionFilePath = getDescriptionPath(srtFilePath);
  try {
    await fs.writeFile(descriptionFilePath, text, "utf8");
  } catch (error) {
    throw new GenerationFailure(`Could not save description to ${descriptionFilePath}`, { cause: error });
  }

  return { descriptionFilePath, text };
}
