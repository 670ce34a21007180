"use client";

import { useCallback, useEffect, useState } from "react";

import { fetchProgress, isFinished } from "@/lib/progress-client";
import { CHANNEL_STYLES, type ChannelStyle, type ProgressPayload } from "@/lib/types";

const POLL_INTERVAL_MS = 2000;

const CHANNEL_LABELS: Record<ChannelStyle, string> = {
  trakin_tech: "Trakin Tech (Hindi)",
  trakin_tech_marathi: "Trakin Tech Marathi",
  trakin_tech_tamil: "Trakin Tech Tamil",
};

export function DescriptionGeneratorForm() {
  const [url, setUrl] = useState("");
  const [channel, setChannel] = useState<ChannelStyle>("trakin_tech");
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [progress, setProgress] = useState<ProgressPayload | null>(null);
  const [submitting, setSubmitting] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const pollProgress = useCallback(async (id: string) => {
    const result = await fetchProgress(id);

    if (result.kind === "progress") {
      setProgress(result.payload);
      return;
    }

    if (result.kind === "gone") {
      setSessionId(null);
    }

    setError(result.message);
  }, []);

  useEffect(() => {
    if (!sessionId || isFinished(progress)) return;

    const interval = setInterval(() => {
      void pollProgress(sessionId);
    }, POLL_INTERVAL_MS);

    return () => clearInterval(interval);
  }, [sessionId, progress, pollProgress]);

  async function handleSubmit(event: React.FormEvent<HTMLFormElement>) {
    event.preventDefault();

    setError(null);
    setProgress(null);
    setSubmitting(true);

    try {
      const response = await fetch("/process", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ url, channel }),
      });

      const payload = (await response.json()) as { session_id?: string; error?: string };

      if (!response.ok || !payload.session_id) {
        throw new Error(payload.error ?? "Could not start processing.");
      }

      setSessionId(payload.session_id);
      await pollProgress(payload.session_id);
    } catch (caught) {
      setError(caught instanceof Error ? caught.message : "Unexpected error while starting the job.");
    } finally {
      setSubmitting(false);
    }
  }

  const busy = submitting || Boolean(sessionId && progress && !isFinished(progress));

  return (
    <div className="glass rounded-3xl p-4 shadow-glow md:p-6">
      <form className="flex flex-col gap-3" onSubmit={handleSubmit}>
        <label htmlFor="video-url" className="text-sm font-semibold text-slate-300">
          Video link
        </label>
        <input
          id="video-url"
          type="url"
          value={url}
          onChange={(event) => setUrl(event.target.value)}
          placeholder="https://www.youtube.com/watch?v=..."
          required
          className="h-12 w-full rounded-2xl border border-indigo-300/30 bg-slate/70 px-4 text-sm text-white outline-none transition focus:border-electric"
        />

        <label htmlFor="channel-style" className="text-sm font-semibold text-slate-300">
          Channel style
        </label>
        <div className="flex flex-col gap-3 md:flex-row">
          <select
            id="channel-style"
            value={channel}
            onChange={(event) => {
              const selected = CHANNEL_STYLES.find((style) => style === event.target.value);
              if (selected) setChannel(selected);
            }}
            className="h-12 w-full rounded-2xl border border-indigo-300/30 bg-slate/70 px-4 text-sm text-white outline-none focus:border-electric"
          >
            {CHANNEL_STYLES.map((style) => (
              <option key={style} value={style}>
                {CHANNEL_LABELS[style]}
              </option>
            ))}
          </select>
          <button
            type="submit"
            disabled={busy}
            className="h-12 min-w-56 rounded-2xl bg-gradient-to-r from-electric to-neon px-6 text-sm font-semibold text-slate-950 transition hover:brightness-110 disabled:cursor-not-allowed disabled:brightness-75"
          >
            {busy ? "Processing..." : "Generate description"}
          </button>
        </div>
      </form>

      {error ? <p className="mt-3 text-sm text-red-300">{error}</p> : null}

      {progress ? (
        <div className="mt-6 border-t border-indigo-200/10 pt-4">
          <div className="flex items-center justify-between text-xs text-slate-300">
            <span>{progress.status}</span>
            <span>{progress.progress}%</span>
          </div>
          <div className="mt-2 h-2 w-full overflow-hidden rounded-full bg-slate">
            <div
              className={`h-full rounded-full ${progress.stage === "failed" ? "bg-punch" : "bg-electric"}`}
              style={{ width: `${progress.progress}%` }}
            />
          </div>

          {progress.video_title ? (
            <p className="mt-3 text-sm text-white">{progress.video_title}</p>
          ) : null}

          {progress.error ? <p className="mt-3 text-sm text-red-300">{progress.error}</p> : null}

          {progress.stage === "completed" ? (
            <div className="mt-4 flex flex-wrap gap-2">
              <a
                href={`/download/${progress.session_id}/srt`}
                className="rounded-xl border border-indigo-300/40 px-4 py-2 text-xs font-semibold text-white transition hover:border-electric hover:text-electric"
              >
                Download transcript (.srt)
              </a>
              <a
                href={`/download/${progress.session_id}/description`}
                className="rounded-xl border border-indigo-300/40 px-4 py-2 text-xs font-semibold text-white transition hover:border-electric hover:text-electric"
              >
                Download description
              </a>
            </div>
          ) : null}
        </div>
      ) : null}
    </div>
  );
}
