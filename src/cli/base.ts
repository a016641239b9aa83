import { Command, Option } from "clipanion";
import { resolveBuckets, type MonthBucket } from "../cache/bucket.js";
import { loadConfig } from "../config/loader.js";
import type { RangeConfig, ShipgaugeConfig } from "../config/types.js";
import { ConfigError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { QualityLedger } from "../metrics/quality.js";
import type { PipelineContext } from "../pipeline.js";
import { describeError, exitCodeFor, ExitCode } from "./exit-codes.js";

/** Commands that work on a range of months, from config or from `--from/--to/--months`. */
export abstract class RangeCommand extends Command {
  from = Option.String("--from", {
    description: "First month to include (MM-YYYY)",
  });

  to = Option.String("--to", {
    description: "Last month to include (MM-YYYY), defaults to the current month",
  });

  months = Option.String("--months", {
    description: "Number of months back from the current month, current month included",
  });

  config = Option.String("-c,--config", {
    description: "Path to the config file",
  });

  protected loadConfig(): ShipgaugeConfig {
    return loadConfig(this.config);
  }

  protected rangeOf(config: ShipgaugeConfig): RangeConfig {
    if (this.months !== undefined) {
      if (this.from !== undefined || this.to !== undefined) {
        throw new ConfigError("--months cannot be combined with --from or --to");
      }
      const monthsBack = Number(this.months);
      if (!Number.isInteger(monthsBack) || monthsBack < 1) {
        throw new ConfigError(`--months must be a positive integer, got '${this.months}'`);
      }
      return { monthsBack };
    }
    if (this.from !== undefined) {
      return { monthsBack: config.range.monthsBack, from: this.from, to: this.to };
    }
    if (this.to !== undefined) {
      throw new ConfigError("--to requires --from");
    }
    return config.range;
  }

  protected buckets(config: ShipgaugeConfig, now: Date): MonthBucket[] {
    return resolveBuckets(this.rangeOf(config), now);
  }

  protected pipelineContext(config: ShipgaugeConfig, offline = false): PipelineContext {
    const logger = createLogger(config.logging);
    return { config, logger, ledger: new QualityLedger(logger), now: new Date(), offline };
  }

  protected fail(err: unknown): ExitCode {
    this.context.stdout.write(`${describeError(err)}\n`);
    return exitCodeFor(err);
  }

  protected printQuality(lines: readonly string[]): void {
    for (const line of lines) {
      this.context.stdout.write(`  ${line}\n`);
    }
  }
}
