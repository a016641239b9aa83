import { Command, Option } from "clipanion";
import { ConfigError } from "../../errors.js";
import { syncSource } from "../../pipeline.js";
import { isSourceName, SOURCE_NAMES } from "../../sources/index.js";
import { RangeCommand } from "../base.js";
import { ExitCode } from "../exit-codes.js";

export class FetchCommand extends RangeCommand {
  static override paths = [["fetch"]];

  static override usage = Command.Usage({
    description: "Fetch and cache every month of the range that is not cached yet",
    details: `
      Months already in the cache are skipped without any request. Each fetched
      month is written as soon as it is complete, so an interrupted run can be
      repeated and only asks for what is missing.
    `,
    examples: [
      ["Fetch usage events for the configured range", "shipgauge fetch usage"],
      ["Fetch pull requests for a fixed span", "shipgauge fetch pulls --from 08-2025 --to 10-2025"],
      ["Fetch the last six months of issues", "shipgauge fetch issues --months 6"],
    ],
  });

  source = Option.String({ name: "source", required: true });

  async execute(): Promise<number> {
    try {
      if (!isSourceName(this.source)) {
        throw new ConfigError(`Unknown source '${this.source}', expected one of: ${SOURCE_NAMES.join(", ")}`);
      }
      const config = this.loadConfig();
      const ctx = this.pipelineContext(config);
      const buckets = this.buckets(config, ctx.now);

      const result = await syncSource(this.source, ctx, buckets);

      this.context.stdout.write(
        `${this.source}: fetched ${result.fetched.length}, cached ${result.skipped.length}\n`,
      );
      for (const id of result.fetched) this.context.stdout.write(`  fetched ${id}\n`);
      for (const id of result.skipped) this.context.stdout.write(`  cached  ${id}\n`);
      this.printQuality(ctx.ledger.summaryLines());
      return ExitCode.OK;
    } catch (err) {
      return this.fail(err);
    }
  }
}
