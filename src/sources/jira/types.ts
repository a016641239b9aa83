import { z } from "zod";

// Changelog items carry a `toString` key, which would collide with
// Object.prototype if declared as an object shape, so items stay records.
export const rawHistorySchema = z.object({
  created: z.string(),
  items: z.array(z.record(z.string(), z.unknown())).default([]),
});

export const rawChangelogSchema = z.object({
  histories: z.array(rawHistorySchema).default([]),
  total: z.number().int().nonnegative().optional(),
});

export type RawHistory = z.infer<typeof rawHistorySchema>;

export const rawIssueSchema = z.object({
  key: z.string().min(1),
  fields: z.object({
    summary: z.string().nullish(),
    issuetype: z.object({ name: z.string() }),
    created: z.string(),
  }),
  changelog: rawChangelogSchema.optional(),
});

export type RawIssue = z.infer<typeof rawIssueSchema>;

/** `/search/jql` pages: a token for the next page until `isLast`. */
export const searchPageSchema = z.object({
  issues: z.array(z.unknown()).default([]),
  nextPageToken: z.string().min(1).optional(),
  isLast: z.boolean().optional(),
});

export const issueChangelogSchema = z.object({
  changelog: rawChangelogSchema.default({}),
});
