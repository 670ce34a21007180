import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";

import { sanitizeTitle } from "@/lib/storage";
import type { DownloadApiStrategy } from "@/lib/types";

const mediaResponseSchema = z.object({
  status: z.enum(["tunnel", "redirect"]),
  url: z.string().url(),
  filename: z.string().optional(),
});

const errorResponseSchema = z.object({
  status: z.literal("error"),
  error: z.object({ code: z.string() }).optional(),
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiDownloadResult {
  audioFilePath: string;
  title: string;
  safeTitle: string;
}

function titleFromFilename(filename: string | undefined): string | null {
  if (!filename) return null;
  const { name } = path.parse(filename);
  return name.trim() || null;
}

function extensionFromFilename(filename: string | undefined): string {
  const ext = filename ? path.extname(filename).toLowerCase() : "";
  return /^\.[a-z0-9]{2,4}$/.test(ext) ? ext : ".mp3";
}

/**
 * Last-resort path through a hosted download API: request an audio-only
 * link for the video, then fetch the file. Each request has its own timeout.
 */
export async function downloadViaApi(params: {
  url: string;
  strategy: DownloadApiStrategy;
  defaultEndpoint?: string;
  defaultTimeoutMs: number;
  outputDir: string;
  fallbackTitle: string;
  fetchImpl?: FetchLike;
  log?: (message: string) => void;
}): Promise<ApiDownloadResult> {
  const { url, strategy, defaultEndpoint, defaultTimeoutMs, outputDir, fallbackTitle, log } = params;
  const fetchImpl = params.fetchImpl ?? fetch;
  const endpoint = strategy.endpoint ?? defaultEndpoint;
  const timeoutMs = strategy.timeoutMs ?? defaultTimeoutMs;

  if (!endpoint) {
    throw new Error("Download API endpoint is not configured (DOWNLOAD_API_URL)");
  }

  const response = await fetchImpl(endpoint, {
    method: "POST",
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
    },
    body: JSON.stringify({ url, downloadMode: "audio", audioFormat: "mp3" }),
    signal: AbortSignal.timeout(timeoutMs),
  });

  const payload: unknown = await response.json();
  const failure = errorResponseSchema.safeParse(payload);
  if (failure.success) {
    throw new Error(`Download API refused the request: ${failure.data.error?.code ?? "unknown error"}`);
  }

  if (!response.ok) {
    throw new Error(`Download API responded with HTTP ${response.status}`);
  }

  const media = mediaResponseSchema.safeParse(payload);
  if (!media.success) {
    throw new Error("Download API returned an unexpected payload");
  }

  const title = titleFromFilename(media.data.filename) ?? fallbackTitle;
  const safeTitle = sanitizeTitle(title) || sanitizeTitle(fallbackTitle);
  const audioFilePath = path.join(outputDir, `${safeTitle}${extensionFromFilename(media.data.filename)}`);

  log?.(`Download API issued a ${media.data.status} link; fetching audio`);

  const fileResponse = await fetchImpl(media.data.url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!fileResponse.ok) {
    throw new Error(`Audio download from API link failed with HTTP ${fileResponse.status}`);
  }

  await fs.writeFile(audioFilePath, Buffer.from(await fileResponse.arrayBuffer()));

  return { audioFilePath, title, safeTitle };
}
