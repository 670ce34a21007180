export interface NormalizedVideoUrl {
  url: string;
  videoId?: string;
}

const VIDEO_ID_REGEX = /^[A-Za-z0-9_-]{11}$/;

const YOUTUBE_HOSTS = [
  "youtube.com",
  "m.youtube.com",
  "music.youtube.com",
  "youtu.be",
  "youtube-nocookie.com",
];

function isValidVideoId(value: string | undefined | null): value is string {
  return Boolean(value && VIDEO_ID_REGEX.test(value));
}

export function extractYouTubeVideoId(rawUrl: string): string | null {
  try {
    const url = new URL(rawUrl.trim());
    const host = url.hostname.replace(/^www\./, "").toLowerCase();

    if (!YOUTUBE_HOSTS.includes(host)) {
      return null;
    }

    const videoId =
      host === "youtu.be"
        ? url.pathname.split("/").filter(Boolean)[0]
        : url.searchParams.get("v") ?? url.pathname.match(/\/(shorts|embed|live)\/([A-Za-z0-9_-]{11})/)?.[2];

    return isValidVideoId(videoId) ? videoId : null;
  } catch {
    return null;
  }
}

/**
 * YouTube links are rewritten to their canonical watch URL. Anything else is
 * handed to the downloaders untouched, since yt-dlp understands many hosts.
 */
export function normalizeVideoUrl(rawUrl: string): NormalizedVideoUrl {
  const trimmed = rawUrl.trim();
  const videoId = extractYouTubeVideoId(trimmed);

  if (!videoId) {
    return { url: trimmed };
  }

  return {
    url: `https://www.youtube.com/watch?v=${videoId}`,
    videoId,
  };
}
