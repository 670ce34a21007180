import { readFileSync } from "node:fs";
import { z } from "zod";

import { ConfigurationError } from "@/lib/errors";
import type { DownloadStrategy } from "@/lib/types";

const ytDlpStrategySchema = z.object({
  kind: z.literal("ytdlp"),
  name: z.string().min(1),
  playerClient: z.string().min(1),
  userAgent: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
  skip: z.array(z.string().min(1)).optional(),
  useCookies: z.boolean().optional(),
  format: z.string().min(1).optional(),
  extractAudio: z.literal("mp3").optional(),
});

const downloadApiStrategySchema = z.object({
  kind: z.literal("api"),
  name: z.string().min(1),
  endpoint: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const strategyListSchema = z
  .array(z.discriminatedUnion("kind", [ytDlpStrategySchema, downloadApiStrategySchema]))
  .superRefine((strategies, context) => {
    const seen = new Set<string>();
    for (const [index, strategy] of strategies.entries()) {
      if (seen.has(strategy.name)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "name"],
          message: `Duplicate strategy name "${strategy.name}"`,
        });
      }
      seen.add(strategy.name);
    }
  });

export function parseDownloadStrategies(raw: unknown): DownloadStrategy[] {
  const parsed = strategyListSchema.safeParse(raw);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid download strategy list: ${details}`);
  }

  return parsed.data;
}

export function loadDownloadStrategies(filePath: string): DownloadStrategy[] {
  let raw: unknown;

  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Could not read download strategies from ${filePath}`, { cause: error });
  }

  return parseDownloadStrategies(raw);
}
