import type { ChannelStyle, JobRecord, JobStage } from "@/lib/types";

const MAX_LOG_ENTRIES = 200;

const TERMINAL_STAGES: ReadonlySet<JobStage> = new Set(["completed", "failed"]);

export interface SessionStoreOptions {
  /** Terminal jobs untouched for longer than this are dropped. */
  ttlMs: number;
  now?: () => number;
}

export interface NewJobInput {
  url: string;
  requestedChannel: string;
  channelStyle: ChannelStyle;
}

export type JobPatch = Partial<Omit<JobRecord, "sessionId" | "createdAt" | "logs">>;

/**
 * In-memory job records keyed by session id. Every record has exactly one
 * writer (its pipeline task); HTTP handlers only read.
 */
export class SessionStore {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private lastId = 0;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  /** Millisecond clock, bumped when two sessions start within the same millisecond. */
  private nextSessionId(): string {
    this.lastId = Math.max(this.now(), this.lastId + 1);
    return String(this.lastId);
  }

  create(input: NewJobInput): JobRecord {
    this.evictExpired();

    const timestamp = this.timestamp();
    const job: JobRecord = {
      sessionId: this.nextSessionId(),
      createdAt: timestamp,
      updatedAt: timestamp,
      url: input.url,
      requestedChannel: input.requestedChannel,
      channelStyle: input.channelStyle,
      stage: "created",
      status: "Starting...",
      progress: 0,
      logs: [{ at: timestamp, stage: "created", message: `Job created for ${input.url}` }],
    };

    this.jobs.set(job.sessionId, job);
    return job;
  }

  get(sessionId: string): JobRecord | undefined {
    this.evictExpired();
    return this.jobs.get(sessionId);
  }

  update(sessionId: string, patch: JobPatch): JobRecord | undefined {
    const job = this.jobs.get(sessionId);
    if (!job) return undefined;

    Object.assign(job, patch, { updatedAt: this.timestamp() });
    return job;
  }

  appendLog(sessionId: string, message: string): void {
    const job = this.jobs.get(sessionId);
    if (!job) return;

    const at = this.timestamp();
    job.logs.unshift({ at, stage: job.stage, message });
    job.logs.length = Math.min(job.logs.length, MAX_LOG_ENTRIES);
    job.updatedAt = at;
  }

  evictExpired(): number {
    const cutoff = this.now() - this.ttlMs;
    let evicted = 0;

    for (const [sessionId, job] of this.jobs) {
      if (TERMINAL_STAGES.has(job.stage) && Date.parse(job.updatedAt) < cutoff) {
        this.jobs.delete(sessionId);
        evicted += 1;
      }
    }

    return evicted;
  }

  get size(): number {
    return this.jobs.size;
  }
}
