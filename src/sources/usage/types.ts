import { z } from "zod";

export const rawTokenUsageSchema = z.object({
  inputTokens: z.number().nonnegative().default(0),
  outputTokens: z.number().nonnegative().default(0),
  cacheWriteTokens: z.number().nonnegative().default(0),
  cacheReadTokens: z.number().nonnegative().default(0),
  totalCents: z.number().default(0),
  discountPercentOff: z.number().min(0).max(100).optional(),
});

export const rawUsageEventSchema = z.object({
  timestamp: z.union([z.string(), z.number()]),
  userEmail: z.string().min(1),
  model: z.string().min(1),
  kind: z.string(),
  isChargeable: z.boolean().default(false),
  isTokenBasedCall: z.boolean().default(false),
  tokenUsage: rawTokenUsageSchema.nullish(),
  cursorTokenFee: z.number().nullish(),
});

export type RawUsageEvent = z.infer<typeof rawUsageEventSchema>;

// Items stay unknown at the page level so a single bad event is skipped
// rather than failing the whole page.
export const usageEventsPageSchema = z.object({
  usageEvents: z.array(z.unknown()).default([]),
  pagination: z
    .object({
      hasNextPage: z.boolean().default(false),
      numPages: z.number().int().optional(),
    })
    .default({}),
});

export const rawTeamMemberSchema = z.object({
  name: z.string().default(""),
  email: z.string().min(1),
  id: z.union([z.string(), z.number()]).transform(String),
  role: z.string().default("member"),
  isRemoved: z.boolean().default(false),
});

export const teamMembersSchema = z.object({
  teamMembers: z.array(rawTeamMemberSchema).default([]),
});

export type RawTeamMember = z.infer<typeof rawTeamMemberSchema>;
