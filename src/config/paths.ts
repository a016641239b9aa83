import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { ShipgaugeConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["SHIPGAUGE_STATE_DIR"] ?? join(homedir(), ".shipgauge");
}

export function getConfigPath(): string {
  return process.env["SHIPGAUGE_CONFIG_PATH"] ?? "shipgauge.config.json";
}

export function getCacheDir(config: ShipgaugeConfig): string {
  return config.cacheDir ?? join(getStateDir(), "cache");
}

export function getOutputDir(config: ShipgaugeConfig): string {
  return config.outputDir ?? join(getStateDir(), "reports");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
