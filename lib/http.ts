import { NextResponse } from "next/server";
import { createReadStream } from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { z } from "zod";

import { errorMessage } from "@/lib/errors";
import type { JobPipeline } from "@/lib/pipeline";
import { fileExists } from "@/lib/storage";
import { DOWNLOADABLE_FILE_TYPES, type DownloadableFileType, type JobRecord, type ProgressPayload } from "@/lib/types";

const processRequestSchema = z.object({
  url: z
    .string({ required_error: "No URL provided", invalid_type_error: "No URL provided" })
    .trim()
    .min(1, "No URL provided"),
  channel: z
    .string({ required_error: "No channel selected", invalid_type_error: "No channel selected" })
    .trim()
    .min(1, "No channel selected"),
});

const CONTENT_TYPES: Record<DownloadableFileType, string> = {
  srt: "application/x-subrip; charset=utf-8",
  description: "text/plain; charset=utf-8",
};

function isDownloadableFileType(value: string): value is DownloadableFileType {
  return DOWNLOADABLE_FILE_TYPES.some((type) => type === value);
}

export function toProgressPayload(job: JobRecord): ProgressPayload {
  return {
    session_id: job.sessionId,
    status: job.status,
    stage: job.stage,
    progress: job.progress,
    video_title: job.videoTitle ?? "",
    audio_file: job.audioFilePath ?? "",
    srt_file: job.transcriptFilePath ?? "",
    description_file: job.descriptionFilePath ?? "",
    channel: job.channelStyle,
    requested_channel: job.requestedChannel,
    url: job.url,
    error: job.error ?? null,
    strategy_used: job.strategyUsed ?? null,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    logs: job.logs,
  };
}

/** Content-Disposition that survives non-ASCII titles. */
export function attachmentDisposition(filename: string): string {
  const asciiFallback = filename.replace(/[^\x20-\x7E]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${asciiFallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export async function handleProcessRequest(pipeline: JobPipeline, request: Request): Promise<NextResponse> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }

  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }

  const parsed = processRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0]?.message ?? "Invalid request" }, { status: 400 });
  }

  try {
    const job = pipeline.startJob(parsed.data);
    console.info(`[process] Session ${job.sessionId} started for ${job.url}`);
    return NextResponse.json({ session_id: job.sessionId });
  } catch (error) {
    return NextResponse.json({ error: errorMessage(error) }, { status: 500 });
  }
}

export function handleProgressRequest(pipeline: JobPipeline, sessionId: string): NextResponse {
  const job = pipeline.store.get(sessionId);

  if (!job) {
    return NextResponse.json({ error: "Session not found" }, { status: 404 });
  }

  return NextResponse.json(toProgressPayload(job), {
    headers: { "Cache-Control": "no-store" },
  });
}

export async function handleDownloadRequest(
  pipeline: JobPipeline,
  sessionId: string,
  fileType: string
): Promise<NextResponse> {
  const job = pipeline.store.get(sessionId);

  if (!job) {
    return NextResponse.json({ error: "Session not found" }, { status: 404 });
  }

  if (!isDownloadableFileType(fileType)) {
    return NextResponse.json({ error: "Invalid file type" }, { status: 400 });
  }

  const filePath = fileType === "srt" ? job.transcriptFilePath : job.descriptionFilePath;

  if (!filePath || !(await fileExists(filePath))) {
    return NextResponse.json({ error: "File not found" }, { status: 404 });
  }

  const stream = createReadStream(filePath);
  const webStream = Readable.toWeb(stream) as ReadableStream;

  return new NextResponse(webStream, {
    status: 200,
    headers: {
      "Content-Type": CONTENT_TYPES[fileType],
      "Content-Disposition": attachmentDisposition(path.basename(filePath)),
      "Cache-Control": "no-store",
    },
  });
}
