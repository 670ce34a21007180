import { describe, expect, it } from "vitest";

import { fetchProgress, isFinished } from "@/lib/progress-client";
import type { ProgressPayload } from "@/lib/types";

const payload: ProgressPayload = {
  session_id: "1000",
  status: "Downloading audio...",
  stage: "downloading",
  progress: 10,
  video_title: "",
  audio_file: "",
  srt_file: "",
  description_file: "",
  channel: "trakin_tech",
  requested_channel: "trakin_tech",
  url: "https://www.youtube.com/watch?v=abc12345678",
  error: null,
  strategy_used: null,
  created_at: "2026-01-01T00:00:00.000Z",
  updated_at: "2026-01-01T00:00:00.000Z",
  logs: [],
};

function respond(body: unknown, status = 200) {
  return async () => new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("fetchProgress", () => {
  it("returns the job record while the session exists", async () => {
    const requested: string[] = [];
    const result = await fetchProgress("1000", async (input) => {
      requested.push(input);
      return respond(payload)();
    });

    expect(result).toEqual({ kind: "progress", payload });
    expect(requested).toEqual(["/progress/1000"]);
  });

  it("reports an evicted session as gone so polling stops", async () => {
    await expect(fetchProgress("1000", respond({ error: "Session not found" }, 404))).resolves.toEqual({
      kind: "gone",
      message: "Session not found",
    });
  });

  it("keeps other failures as transient errors", async () => {
    await expect(fetchProgress("1000", respond({ error: "Internal error" }, 500))).resolves.toEqual({
      kind: "error",
      message: "Internal error",
    });
    await expect(
      fetchProgress("1000", async () => {
        throw new Error("network down");
      })
    ).resolves.toEqual({ kind: "error", message: "network down" });
  });
});

describe("isFinished", () => {
  it("is true only for terminal stages", () => {
    expect(isFinished(null)).toBe(false);
    expect(isFinished(payload)).toBe(false);
    expect(isFinished({ ...payload, stage: "failed" })).toBe(true);
    expect(isFinished({ ...payload, stage: "completed" })).toBe(true);
  });
});
