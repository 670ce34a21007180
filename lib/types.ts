export type JobStage =
  | "created"
  | "downloading"
  | "transcribing"
  | "generating"
  | "completed"
  | "failed";

export const CHANNEL_STYLES = ["trakin_tech", "trakin_tech_marathi", "trakin_tech_tamil"] as const;

export type ChannelStyle = (typeof CHANNEL_STYLES)[number];

export const DEFAULT_CHANNEL_STYLE: ChannelStyle = "trakin_tech";

export interface JobLog {
  at: string;
  stage: JobStage;
  message: string;
}

export interface JobRecord {
  sessionId: string;
  createdAt: string;
  updatedAt: string;
  url: string;
  requestedChannel: string;
  channelStyle: ChannelStyle;
  stage: JobStage;
  status: string;
  progress: number;
  videoTitle?: string;
  audioFilePath?: string;
  transcriptFilePath?: string;
  descriptionFilePath?: string;
  strategyUsed?: string;
  error?: string;
  logs: JobLog[];
}

export interface YtDlpStrategy {
  kind: "ytdlp";
  name: string;
  playerClient: string;
  userAgent?: string;
  headers?: Record<string, string>;
  skip?: string[];
  useCookies?: boolean;
  format?: string;
  extractAudio?: "mp3";
}

export interface DownloadApiStrategy {
  kind: "api";
  name: string;
  endpoint?: string;
  timeoutMs?: number;
}

export type DownloadStrategy = YtDlpStrategy | DownloadApiStrategy;

export interface AcquiredAudio {
  audioFilePath: string;
  title: string;
  safeTitle: string;
  strategy: DownloadStrategy;
}

/** Snake-cased job record served by `GET /progress/:sessionId`. */
export interface ProgressPayload {
  session_id: string;
  status: string;
  stage: JobStage;
  progress: number;
  video_title: string;
  audio_file: string;
  srt_file: string;
  description_file: string;
  channel: ChannelStyle;
  requested_channel: string;
  url: string;
  error: string | null;
  strategy_used: string | null;
  created_at: string;
  updated_at: string;
  logs: JobLog[];
}

export const DOWNLOADABLE_FILE_TYPES = ["srt", "description"] as const;

export type DownloadableFileType = (typeof DOWNLOADABLE_FILE_TYPES)[number];
