import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { TranscriptionFailure } from "@/lib/errors";
import { transcribeAudio } from "@/lib/transcription";
import { FakeTranslator, makeTempDir, SAMPLE_SRT } from "./helpers";

function writeAudio(dir: string): string {
  const audioFilePath = path.join(dir, "Phone Review.m4a");
  writeFileSync(audioFilePath, "not really audio");
  return audioFilePath;
}

describe("transcribeAudio", () => {
  it("writes the English SRT under the sanitised title", async () => {
    const dir = makeTempDir("transcription");
    const audioFilePath = writeAudio(dir);
    const translator = new FakeTranslator(async () => SAMPLE_SRT);
    const logs: string[] = [];

    const result = await transcribeAudio({
      audioFilePath,
      safeTitle: "Phone Review",
      outputDir: dir,
      translator,
      log: (message) => logs.push(message),
    });

    const transcriptFilePath = path.join(dir, "Phone Review.srt");
    expect(result).toEqual({ transcriptFilePath, srt: SAMPLE_SRT });
    expect(readFileSync(transcriptFilePath, "utf8")).toBe(SAMPLE_SRT);
    expect(translator.calls).toEqual([audioFilePath]);
    expect(logs[logs.length - 1]).toBe(`Transcript saved to ${transcriptFilePath} (14 words)`);
  });

  it("passes translator errors through as transcription failures", async () => {
    const dir = makeTempDir("transcription");
    const translator = new FakeTranslator(async () => {
      throw new Error("401 invalid api key");
    });

    await expect(
      transcribeAudio({ audioFilePath: writeAudio(dir), safeTitle: "Phone Review", outputDir: dir, translator })
    ).rejects.toThrow(new TranscriptionFailure("401 invalid api key"));
  });

  it("rejects an empty transcript", async () => {
    const dir = makeTempDir("transcription");
    const translator = new FakeTranslator(async () => "\n");

    await expect(
      transcribeAudio({ audioFilePath: writeAudio(dir), safeTitle: "Phone Review", outputDir: dir, translator })
    ).rejects.toThrow("Translation endpoint returned an empty transcript");
  });

  it("fails before calling the backend when the audio file is missing", async () => {
    const dir = makeTempDir("transcription");
    const translator = new FakeTranslator(async () => SAMPLE_SRT);
    const audioFilePath = path.join(dir, "missing.m4a");

    await expect(
      transcribeAudio({ audioFilePath, safeTitle: "missing", outputDir: dir, translator })
    ).rejects.toThrow(`Audio file is not readable: ${audioFilePath}`);
    expect(translator.calls).toEqual([]);
  });
});
