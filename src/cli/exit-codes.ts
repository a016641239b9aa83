import { ZodError } from "zod";
import {
  ApiError,
  AuthError,
  CacheCorruptError,
  ConfigError,
  NotFoundError,
  RateLimitError,
} from "../errors.js";
import { LockHeldError } from "../utils/file-lock.js";

export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  CONFIG: 2,
  AUTH: 3,
  RATE_LIMITED: 4,
  API: 5,
  CACHE: 6,
  LOCKED: 7,
  NOT_FOUND: 8,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof ConfigError || err instanceof ZodError) return ExitCode.CONFIG;
  if (err instanceof AuthError) return ExitCode.AUTH;
  if (err instanceof RateLimitError) return ExitCode.RATE_LIMITED;
  if (err instanceof ApiError) return ExitCode.API;
  if (err instanceof CacheCorruptError) return ExitCode.CACHE;
  if (err instanceof LockHeldError) return ExitCode.LOCKED;
  if (err instanceof NotFoundError) return ExitCode.NOT_FOUND;
  return ExitCode.FAILURE;
}

/** The single line printed when a command aborts. */
export function describeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return `Error: ${message.replace(/\s+/g, " ").trim()}`;
}
