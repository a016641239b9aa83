import { z } from "zod";

export const searchPageSchema = z.object({
  total_count: z.number().int().nonnegative(),
  incomplete_results: z.boolean().optional(),
  items: z.array(
    z.object({
      number: z.number().int().positive(),
      title: z.string(),
    }),
  ),
});

export type SearchItem = z.infer<typeof searchPageSchema>["items"][number];

// Detail payloads are validated per pull request in the normalizer.
export const rawPullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  created_at: z.string(),
  merged_at: z.string().nullable(),
  merged: z.boolean().optional(),
  comments: z.number().int().nonnegative().default(0),
  review_comments: z.number().int().nonnegative().default(0),
  commits: z.number().int().nonnegative().default(0),
  changed_files: z.number().int().nonnegative().default(0),
});

export type RawPullRequest = z.infer<typeof rawPullRequestSchema>;
