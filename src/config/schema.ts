import { z } from "zod";

const sourceConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  strategy: z.enum(["auto", "listing", "article"]).default("auto"),
  selector: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
});

export const appConfigSchema = z.object({
  sources: z.array(sourceConfigSchema).default([]),
  schedule: z
    .object({
      refresh: z.array(z.string().min(1)).min(1).default(["0 6 * * *", "0 18 * * *"]),
    })
    .default({}),
  refresh: z
    .object({
      maxConcurrency: z.number().int().positive().default(2),
      perOriginIntervalMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(15000),
      retries: z.number().int().nonnegative().max(10).default(2),
      userAgent: z
        .string()
        .min(1)
        .default("feedsmith/0.1 (page-to-RSS generator)"),
    })
    .default({}),
  discovery: z
    .object({
      recheckHours: z.number().nonnegative().default(24),
    })
    .default({}),
  extraction: z
    .object({
      listingThreshold: z.number().int().positive().default(5),
      minTitleLength: z.number().int().nonnegative().default(10),
      maxItems: z.number().int().positive().default(50),
      maxSummaryLength: z.number().int().positive().default(500),
    })
    .default({}),
  feed: z
    .object({
      maxItems: z.number().int().positive().default(30),
      language: z.string().min(1).default("en"),
    })
    .default({}),
  normalize: z
    .object({
      trackingParams: z.array(z.string().min(1)).optional(),
    })
    .default({}),
  server: z
    .object({
      baseUrl: z.string().url().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
