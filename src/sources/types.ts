import type { ZodError } from "zod";

/** Outcome of mapping one raw API item; a bad item is skipped with a reason, never thrown. */
export type Normalized<T> = { ok: true; record: T } | { ok: false; reason: string };

export function rejectFrom(error: ZodError): { ok: false; reason: string } {
  const issue = error.issues[0];
  return {
    ok: false,
    reason: issue ? `${issue.path.join(".") || "(item)"}: ${issue.message}` : "invalid item",
  };
}
