import path from "node:path";
import { describe, expect, it } from "vitest";

import { downloadViaApi, type FetchLike } from "@/lib/download-api";
import { makeTempDir } from "./helpers";

const VIDEO_URL = "https://www.youtube.com/watch?v=abc12345678";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("downloadViaApi", () => {
  it("refuses to run without an endpoint", async () => {
    await expect(
      downloadViaApi({
        url: VIDEO_URL,
        strategy: { kind: "api", name: "download_api" },
        defaultTimeoutMs: 1000,
        outputDir: makeTempDir("api"),
        fallbackTitle: "audio-abc12345678",
        fetchImpl: async () => jsonResponse({}),
      })
    ).rejects.toThrow("Download API endpoint is not configured (DOWNLOAD_API_URL)");
  });

  it("asks for audio only and falls back to the video id for the file name", async () => {
    const dir = makeTempDir("api");
    const bodies: unknown[] = [];
    const fetchImpl: FetchLike = async (input, init) => {
      if (typeof init?.body === "string") bodies.push(JSON.parse(init.body));
      return input === "https://dl.test/custom"
        ? jsonResponse({ status: "redirect", url: "https://media.test/file" })
        : new Response("bytes");
    };

    const result = await downloadViaApi({
      url: VIDEO_URL,
      strategy: { kind: "api", name: "download_api", endpoint: "https://dl.test/custom" },
      defaultEndpoint: "https://dl.test/default",
      defaultTimeoutMs: 1000,
      outputDir: dir,
      fallbackTitle: "audio-abc12345678",
      fetchImpl,
    });

    expect(bodies).toEqual([{ url: VIDEO_URL, downloadMode: "audio", audioFormat: "mp3" }]);
    expect(result).toEqual({
      audioFilePath: path.join(dir, "audio-abc12345678.mp3"),
      title: "audio-abc12345678",
      safeTitle: "audio-abc12345678",
    });
  });

  it("surfaces the error code the API returns", async () => {
    await expect(
      downloadViaApi({
        url: VIDEO_URL,
        strategy: { kind: "api", name: "download_api" },
        defaultEndpoint: "https://dl.test/api",
        defaultTimeoutMs: 1000,
        outputDir: makeTempDir("api"),
        fallbackTitle: "audio-abc12345678",
        fetchImpl: async () => jsonResponse({ status: "error", error: { code: "error.api.fetch.fail" } }, 400),
      })
    ).rejects.toThrow("Download API refused the request: error.api.fetch.fail");
  });
});
