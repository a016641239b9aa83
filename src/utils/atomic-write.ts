import { randomBytes } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";

const TEMP_SUFFIX = ".tmp";

/**
 * Writes to a sibling temp file and renames it over the target, so readers
 * only ever see the old file or the complete new one.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.${randomBytes(4).toString("hex")}${TEMP_SUFFIX}`;
  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
