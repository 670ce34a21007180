import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { generateDescription } from "@/lib/description";
import { GenerationFailure, ValidationError } from "@/lib/errors";
import { buildPrompt, loadPromptTemplates } from "@/lib/prompts";
import { FakeGenerator, makeTempDir, SAMPLE_SRT } from "./helpers";

const templates = loadPromptTemplates(path.join(process.cwd(), "prompts"));

describe("generateDescription", () => {
  it("rejects transcripts shorter than 50 characters without calling the backend", async () => {
    const dir = makeTempDir("description");
    const generator = new FakeGenerator(["unused"]);

    const error = await generateDescription({
      srt: "1\n00:00:00,000 --> 00:00:01,000\nHi\n",
      channel: "trakin_tech",
      srtFilePath: path.join(dir, "Short.srt"),
      generator,
      templates,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty(
      "message",
      "Transcript is too short (34 chars); the file may be empty or corrupted"
    );
    expect(generator.prompts).toEqual([]);
    expect(existsSync(path.join(dir, "Short_description.txt"))).toBe(false);
  });

  it("accumulates streamed chunks and writes them next to the transcript", async () => {
    const dir = makeTempDir("description");
    const generator = new FakeGenerator(["Part one. ", "Part two."]);

    const result = await generateDescription({
      srt: SAMPLE_SRT,
      channel: "trakin_tech_marathi",
      srtFilePath: path.join(dir, "Phone Review.srt"),
      generator,
      templates,
    });

    expect(result).toEqual({
      descriptionFilePath: path.join(dir, "Phone Review_description.txt"),
      text: "Part one. Part two.",
    });
    expect(readFileSync(result.descriptionFilePath, "utf8")).toBe("Part one. Part two.");
    expect(generator.prompts).toEqual([buildPrompt(templates, "trakin_tech_marathi", SAMPLE_SRT)]);
  });

  it("wraps backend errors as generation failures", async () => {
    const dir = makeTempDir("description");
    const generator = new FakeGenerator(["partial"], new Error("quota exhausted"));

    await expect(
      generateDescription({
        srt: SAMPLE_SRT,
        channel: "trakin_tech",
        srtFilePath: path.join(dir, "Video.srt"),
        generator,
        templates,
      })
    ).rejects.toThrow(new GenerationFailure("quota exhausted"));
  });

  it("fails when the backend produces no text", async () => {
    const dir = makeTempDir("description");

    await expect(
      generateDescription({
        srt: SAMPLE_SRT,
        channel: "trakin_tech",
        srtFilePath: path.join(dir, "Video.srt"),
        generator: new FakeGenerator(["  "]),
        templates,
      })
    ).rejects.toThrow("Generative backend returned no text");
  });
});
