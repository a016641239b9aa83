import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import { formatIssues, loadConfig, substituteEnv } from "../../config/loader.js";
import { getCacheDir, getConfigPath, getOutputDir } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import type { ShipgaugeConfig } from "../../config/types.js";
import { describeError, exitCodeFor, ExitCode } from "../exit-codes.js";

const REDACTED = "***REDACTED***";

function mask(secret: string | undefined): string | undefined {
  return secret === undefined ? undefined : REDACTED;
}

export function redactConfig(config: ShipgaugeConfig): ShipgaugeConfig {
  const { usage, github, jira } = config.sources;
  return {
    ...config,
    sources: {
      usage: usage && { ...usage, apiKey: mask(usage.apiKey) },
      github: github && { ...github, token: mask(github.token) },
      jira: jira && { ...jira, apiToken: mask(jira.apiToken) },
    },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the resolved configuration (secrets redacted)",
    examples: [["Show config", "shipgauge config show"]],
  });

  configFile = Option.String("-c,--config", { description: "Path to the config file" });

  async execute(): Promise<number> {
    let config: ShipgaugeConfig;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(`${describeError(err)}\n`);
      return exitCodeFor(err);
    }

    const resolved = {
      ...redactConfig(config),
      cacheDir: getCacheDir(config),
      outputDir: getOutputDir(config),
    };
    this.context.stdout.write(JSON.stringify(resolved, null, 2) + "\n");
    return ExitCode.OK;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "shipgauge config validate"],
      ["Validate specific file", "shipgauge config validate ./team.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return ExitCode.CONFIG;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return ExitCode.OK;
    } catch (err) {
      const detail = err instanceof ZodError ? formatIssues(err) : describeError(err);
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${detail}\n`);
      return ExitCode.CONFIG;
    }
  }
}
