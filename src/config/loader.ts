import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import type { ShipgaugeConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

export function loadConfig(path?: string): ShipgaugeConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    throw new ConfigError(
      `Config ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Config ${configPath} is invalid: ${formatIssues(err)}`);
    }
    throw err;
  }
}

export function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
