import { dirname, join } from "node:path";
import { ensureDir } from "../config/paths.js";
import { writeFileAtomic } from "../utils/atomic-write.js";
import type { Report } from "./assembler.js";

/** `<outputDir>/<kind>-report.json`; the previous report of the same kind is replaced. */
export function reportPath(outputDir: string, report: Report): string {
  return join(outputDir, `${report.kind}-report.json`);
}

export async function writeReport(path: string, report: Report): Promise<string> {
  ensureDir(dirname(path));
  await writeFileAtomic(path, JSON.stringify(report, null, 2) + "\n");
  return path;
}
