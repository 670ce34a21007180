const TIMING_LINE = /-->/;
const INDEX_LINE = /^\d+$/;

/**
 * Flattens SRT text into prose: drops cue numbers, timing lines and markup,
 * and collapses whitespace. Lines it does not recognise are kept as text.
 */
export function srtToPlainText(srt: string): string {
  const textLines: string[] = [];

  for (const rawLine of srt.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line || INDEX_LINE.test(line) || TIMING_LINE.test(line)) {
      continue;
    }

    const clean = line
      .replace(/<[^>]+>/g, "")
      .replace(/\s+/g, " ")
      .trim();

    if (clean) {
      textLines.push(clean);
    }
  }

  return textLines.join(" ").replace(/\s+/g, " ").trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
