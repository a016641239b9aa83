import type { WireTimestamp } from "../records/types.js";

const ISO =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const EPOCH_MS = /^\d{10,}$/;
const WIRE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Normalizes the timestamp flavours the sources emit (ISO-8601 with `Z`,
 * `+HH:MM` or `+HHMM`, epoch milliseconds as number or string) to
 * `YYYY-MM-DD HH:MM:SS` in UTC. A value without an offset is read as UTC.
 */
export function normalizeTimestamp(value: unknown): WireTimestamp | null {
  const ms = toEpochMs(value);
  return ms === null ? null : formatWireTimestamp(ms);
}

export function formatWireTimestamp(ms: number): WireTimestamp {
  return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}

/** Epoch ms of a `YYYY-MM-DD HH:MM:SS` UTC value, or null when it is not one. */
export function parseWireTimestamp(value: string): number | null {
  const match = WIRE.exec(value);
  if (!match) return null;
  const [, y, mo, d, h, mi, s] = match;
  return validUtc(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s));
}

function toEpochMs(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (EPOCH_MS.test(text)) return Number(text);

  const match = ISO.exec(text);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, fraction, offset] = match;

  const base = validUtc(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s ?? "0"));
  if (base === null) return null;

  const millis = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;
  return base + millis - offsetMs(offset);
}

function offsetMs(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes) * 60_000;
}

function validUtc(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): number | null {
  if (hour > 23 || minute > 59 || second > 59) return null;
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  // Date.UTC rolls 2025-02-30 over into March
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return null;
  return ms;
}
