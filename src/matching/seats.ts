import type { TeamMember, UsageEvent } from "../records/types.js";
import { parseWireTimestamp } from "../sources/timestamps.js";

const DAY_MS = 86_400_000;
const OWNER_ROLES = new Set(["owner", "free-owner"]);

export interface IdleSeat {
  readonly email: string;
  readonly name: string;
  readonly role: string;
  /** YYYY-MM-DD of the latest usage event, null when the member never used the tool. */
  readonly lastActivity: string | null;
  readonly daysInactive: number | null;
}

export interface IdleThreshold {
  readonly thresholdDays: number;
  readonly members: IdleSeat[];
}

export interface SeatActivity {
  readonly totalMembers: number;
  readonly activeMembers: number;
  readonly owners: number;
  readonly removedMembers: number;
  readonly idle: IdleThreshold[];
  readonly neverUsed: IdleSeat[];
  /** Share of active seats used within the shortest threshold, 0-100. */
  readonly adoptionRate: number;
}

export function isOwner(member: TeamMember): boolean {
  return OWNER_ROLES.has(member.role);
}

/** Latest activity day (epoch day number, UTC) per lowercased email. */
export function lastActivityByEmail(events: Iterable<UsageEvent>): Map<string, number> {
  const last = new Map<string, number>();
  for (const event of events) {
    const ms = parseWireTimestamp(event.timestamp);
    if (ms === null) continue;
    const day = Math.floor(ms / DAY_MS);
    const email = event.userEmail.toLowerCase();
    const seen = last.get(email);
    if (seen === undefined || day > seen) last.set(email, day);
  }
  return last;
}

/**
 * Correlates seat holders with usage. A seat is idle for a threshold when its
 * last activity is more than that many days before the reference date, or
 * when there is no activity at all.
 */
export function findIdleSeats(
  members: readonly TeamMember[],
  events: Iterable<UsageEvent>,
  referenceDate: Date,
  thresholdsDays: readonly number[],
): SeatActivity {
  const active = members.filter((m) => !m.isRemoved);
  const lastActivity = lastActivityByEmail(events);
  const today = Math.floor(referenceDate.getTime() / DAY_MS);
  const thresholds = [...new Set(thresholdsDays)].sort((a, b) => a - b);

  const seats = active.map((member): IdleSeat => {
    const email = member.email.toLowerCase();
    const day = lastActivity.get(email);
    return {
      email,
      name: member.name,
      role: member.role,
      lastActivity: day === undefined ? null : new Date(day * DAY_MS).toISOString().slice(0, 10),
      daysInactive: day === undefined ? null : today - day,
    };
  });

  const idle = thresholds.map((thresholdDays) => ({
    thresholdDays,
    members: seats
      .filter((seat) => seat.daysInactive === null || seat.daysInactive > thresholdDays)
      .sort(compareIdle),
  }));

  const neverUsed = seats.filter((seat) => seat.lastActivity === null).sort(compareNames);
  const idleAtShortest = idle[0]?.members.length ?? neverUsed.length;

  return {
    totalMembers: members.length,
    activeMembers: active.length,
    owners: active.filter(isOwner).length,
    removedMembers: members.length - active.length,
    idle,
    neverUsed,
    adoptionRate: active.length === 0 ? 0 : ((active.length - idleAtShortest) / active.length) * 100,
  };
}

/** Longest idle first, members who never used the tool last. */
function compareIdle(a: IdleSeat, b: IdleSeat): number {
  if (a.daysInactive !== b.daysInactive) {
    if (a.daysInactive === null) return 1;
    if (b.daysInactive === null) return -1;
    return b.daysInactive - a.daysInactive;
  }
  return compareNames(a, b);
}

function compareNames(a: IdleSeat, b: IdleSeat): number {
  const left = (a.name || a.email).toLowerCase();
  const right = (b.name || b.email).toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  return a.email < b.email ? -1 : a.email > b.email ? 1 : 0;
}
