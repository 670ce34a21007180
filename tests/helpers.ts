import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import type { TextGenerator } from "@/lib/description";
import type { SpeechTranslator } from "@/lib/transcription";

export const SAMPLE_SRT = [
  "1",
  "00:00:00,000 --> 00:00:04,000",
  "Today we are unboxing the new phone.",
  "",
  "2",
  "00:00:41,000 --> 00:00:45,000",
  "Let's talk about the display and battery.",
  "",
].join("\n");

export function makeTempDir(prefix: string): string {
  return mkdtempSync(path.join(tmpdir(), `${prefix}-`));
}

export class FakeTranslator implements SpeechTranslator {
  readonly calls: string[] = [];

  constructor(private readonly respond: (audioFilePath: string) => Promise<string>) {}

  translateToSrt(audioFilePath: string): Promise<string> {
    this.calls.push(audioFilePath);
    return this.respond(audioFilePath);
  }
}

export class FakeGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly chunks: string[], private readonly failure?: Error) {}

  async *streamText(prompt: string): AsyncIterable<string> {
    this.prompts.push(prompt);
    for (const chunk of this.chunks) {
      yield chunk;
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}
