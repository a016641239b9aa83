import { z } from "zod";
import type { ShipgaugeConfig } from "./types.js";

const bucketIdSchema = z.string().regex(/^(0[1-9]|1[0-2])-\d{4}$/, "expected MM-YYYY");

const fetchSchema = z.object({
  pageSize: z.number().int().positive().max(1000).default(100),
  requestDelaySeconds: z.number().min(0).default(3),
  maxRetries: z.number().int().min(0).max(10).default(5),
  timeoutSeconds: z.number().positive().default(30),
});

const rangeSchema = z
  .object({
    monthsBack: z.number().int().positive().default(2),
    from: bucketIdSchema.optional(),
    to: bucketIdSchema.optional(),
  })
  .refine((r) => r.to === undefined || r.from !== undefined, {
    message: "range.to requires range.from",
  });

const usageSourceSchema = z.object({
  baseUrl: z.string().url().default("https://api.cursor.com"),
  apiKey: z.string().min(1).optional(),
  pageSize: z.number().int().positive().optional(),
});

const githubSourceSchema = z.object({
  baseUrl: z.string().url().default("https://api.github.com"),
  token: z.string().min(1).optional(),
  organization: z.string().min(1).optional(),
  repositories: z.array(z.string().min(1)).default([]),
  pageSize: z.number().int().positive().max(100).optional(),
});

const jiraSourceSchema = z.object({
  baseUrl: z.string().url().optional(),
  email: z.string().min(1).optional(),
  apiToken: z.string().min(1).optional(),
  projectKey: z.string().regex(/^[A-Za-z]+$/, "expected an alphabetic project key").optional(),
  pageSize: z.number().int().positive().optional(),
});

const statusSchema = z.object({
  inProgress: z.array(z.string().min(1)).default(["In Progress"]),
  done: z.array(z.string().min(1)).default(["Done"]),
});

const metricsSchema = z.object({
  cycleTime: z
    .object({ issueTypes: z.array(z.string().min(1)).default(["Story", "Sub-task"]) })
    .default({}),
  bugResolution: z
    .object({ issueTypes: z.array(z.string().min(1)).default(["Bug"]) })
    .default({}),
});

const billingSchema = z.object({
  topCount: z.number().int().positive().default(20),
  topModelsForUsers: z.number().int().positive().default(5),
});

const seatsSchema = z.object({
  thresholdsDays: z.array(z.number().int().positive()).default([30, 60, 90]),
  topCount: z.number().int().positive().default(20),
  referenceDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD").optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const shipgaugeConfigSchema = z.object({
  fetch: fetchSchema.default({}),
  range: rangeSchema.default({}),
  sources: z
    .object({
      usage: usageSourceSchema.optional(),
      github: githubSourceSchema.optional(),
      jira: jiraSourceSchema.optional(),
    })
    .default({}),
  statuses: statusSchema.default({}),
  metrics: metricsSchema.default({}),
  billing: billingSchema.default({}),
  seats: seatsSchema.default({}),
  cacheDir: z.string().optional(),
  outputDir: z.string().optional(),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): ShipgaugeConfig {
  return shipgaugeConfigSchema.parse(raw);
}
