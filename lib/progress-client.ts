import type { ProgressPayload } from "@/lib/types";

/** `gone` means the session no longer exists and polling must stop. */
export type PollResult =
  | { kind: "progress"; payload: ProgressPayload }
  | { kind: "gone"; message: string }
  | { kind: "error"; message: string };

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

function readError(payload: unknown, fallback: string): string {
  if (typeof payload === "object" && payload !== null && "error" in payload && typeof payload.error === "string") {
    return payload.error;
  }

  return fallback;
}

export function isFinished(progress: ProgressPayload | null): boolean {
  return progress?.stage === "completed" || progress?.stage === "failed";
}

export async function fetchProgress(sessionId: string, fetchImpl: FetchLike = fetch): Promise<PollResult> {
  let response: Response;
  try {
    response = await fetchImpl(`/progress/${sessionId}`, { cache: "no-store" });
  } catch (error) {
    return { kind: "error", message: error instanceof Error ? error.message : "Could not read job progress." };
  }

  const payload: unknown = await response.json().catch(() => null);

  if (response.status === 404) {
    return { kind: "gone", message: readError(payload, "Session not found") };
  }

  if (!response.ok || typeof payload !== "object" || payload === null || !("session_id" in payload)) {
    return { kind: "error", message: readError(payload, "Could not read job progress.") };
  }

  return { kind: "progress", payload: payload as ProgressPayload };
}
