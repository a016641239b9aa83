import type { TeamMember, UsageEvent } from "../../records/types.js";
import { normalizeTimestamp } from "../timestamps.js";
import { rejectFrom, type Normalized } from "../types.js";
import { rawUsageEventSchema, type RawTeamMember, type RawUsageEvent } from "./types.js";

const USAGE_BASED_KIND = "Usage-based";

export function normalizeUsageEvent(raw: unknown): Normalized<UsageEvent> {
  const parsed = rawUsageEventSchema.safeParse(raw);
  if (!parsed.success) return rejectFrom(parsed.error);
  const event = parsed.data;

  const timestamp = normalizeTimestamp(event.timestamp);
  if (timestamp === null) {
    return { ok: false, reason: `unparseable timestamp ${JSON.stringify(event.timestamp)}` };
  }

  return {
    ok: true,
    record: {
      type: "usage_event",
      timestamp,
      userEmail: event.userEmail.toLowerCase(),
      model: event.model,
      kind: event.kind === USAGE_BASED_KIND ? "usage_based" : "included",
      tokenCostCents: tokenCostCents(event),
      platformFeeCents: event.cursorTokenFee ?? 0,
      isChargeable: event.isChargeable,
      isTokenBased: event.isTokenBasedCall,
      tokens: {
        input: event.tokenUsage?.inputTokens ?? 0,
        output: event.tokenUsage?.outputTokens ?? 0,
        cacheWrite: event.tokenUsage?.cacheWriteTokens ?? 0,
        cacheRead: event.tokenUsage?.cacheReadTokens ?? 0,
      },
    },
  };
}

/** `totalCents` is the list price; the charged amount applies the discount. */
function tokenCostCents(event: RawUsageEvent): number {
  const usage = event.tokenUsage;
  if (!usage) return 0;
  const discount = usage.discountPercentOff ?? 0;
  return discount > 0 ? usage.totalCents * (1 - discount / 100) : usage.totalCents;
}

export function normalizeTeamMember(raw: RawTeamMember): TeamMember {
  return {
    name: raw.name,
    email: raw.email.toLowerCase(),
    userId: raw.id,
    role: raw.role,
    isRemoved: raw.isRemoved,
  };
}
