import { readFileSync } from "node:fs";
import path from "node:path";

import { ConfigurationError } from "@/lib/errors";
import { CHANNEL_STYLES, type ChannelStyle, DEFAULT_CHANNEL_STYLE } from "@/lib/types";

export const TRANSCRIPT_PLACEHOLDER = "{{transcript}}";

export type PromptTemplates = Readonly<Record<ChannelStyle, string>>;

export function isChannelStyle(value: unknown): value is ChannelStyle {
  return typeof value === "string" && CHANNEL_STYLES.some((style) => style === value);
}

/** Unknown or empty selectors resolve to the default style. */
export function resolveChannelStyle(value: string | null | undefined): ChannelStyle {
  const normalized = value?.trim();
  return isChannelStyle(normalized) ? normalized : DEFAULT_CHANNEL_STYLE;
}

function readTemplate(directory: string, style: ChannelStyle): string {
  const filePath = path.join(directory, `${style}.txt`);

  let template: string;
  try {
    template = readFileSync(filePath, "utf8").trimEnd();
  } catch (error) {
    throw new ConfigurationError(`Prompt template for ${style} is missing (${filePath})`, { cause: error });
  }

  if (!template.includes(TRANSCRIPT_PLACEHOLDER)) {
    throw new ConfigurationError(`Prompt template ${filePath} has no ${TRANSCRIPT_PLACEHOLDER} placeholder`);
  }

  return template;
}

export function loadPromptTemplates(directory: string): PromptTemplates {
  return {
    trakin_tech: readTemplate(directory, "trakin_tech"),
    trakin_tech_marathi: readTemplate(directory, "trakin_tech_marathi"),
    trakin_tech_tamil: readTemplate(directory, "trakin_tech_tamil"),
  };
}

/** Embeds the SRT text verbatim into the template for the channel style. */
export function buildPrompt(templates: PromptTemplates, channel: string | null | undefined, srt: string): string {
  const template = templates[resolveChannelStyle(channel)];
  return template.split(TRANSCRIPT_PLACEHOLDER).join(srt);
}
