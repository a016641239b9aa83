import * as lockfile from "proper-lockfile";
import { ShipgaugeError } from "../errors.js";

export class LockHeldError extends ShipgaugeError {
  constructor(path: string) {
    super(`${path} is locked by another shipgauge run`, "LOCK_HELD");
    this.name = "LockHeldError";
  }
}

/**
 * Runs `fn` while holding `<path>.lock`. With the default of zero retries a
 * second process fails immediately instead of waiting.
 */
export async function withFileLock<T>(
  path: string,
  fn: () => T | Promise<T>,
  retries = 0,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(path, {
      retries: { retries, minTimeout: 100 },
      realpath: false,
    });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ELOCKED") {
      throw new LockHeldError(path);
    }
    throw err;
  }

  try {
    return await fn();
  } finally {
    await release();
  }
}
