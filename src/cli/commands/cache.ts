import { Command, Option } from "clipanion";
import { formatBucketId, parseBucketId } from "../../cache/bucket.js";
import { loadConfig } from "../../config/loader.js";
import { getCacheDir } from "../../config/paths.js";
import { ConfigError } from "../../errors.js";
import { isSourceName, openStore, SOURCE_NAMES } from "../../sources/index.js";
import { describeError, exitCodeFor, ExitCode } from "../exit-codes.js";

export class CacheListCommand extends Command {
  static override paths = [["cache", "list"]];

  static override usage = Command.Usage({
    description: "List cached months per source",
    examples: [["List the cache", "shipgauge cache list"]],
  });

  config = Option.String("-c,--config", { description: "Path to the config file" });

  async execute(): Promise<number> {
    try {
      const cacheDir = getCacheDir(loadConfig(this.config));
      this.context.stdout.write(`Cache: ${cacheDir}\n`);

      for (const source of SOURCE_NAMES) {
        const buckets = await openStore(source, cacheDir).list();
        this.context.stdout.write(
          buckets.length === 0
            ? `  ${source}: (empty)\n`
            : `  ${source}: ${buckets.map(formatBucketId).join(", ")}\n`,
        );
      }
      return ExitCode.OK;
    } catch (err) {
      this.context.stdout.write(`${describeError(err)}\n`);
      return exitCodeFor(err);
    }
  }
}

export class CachePurgeCommand extends Command {
  static override paths = [["cache", "purge"]];

  static override usage = Command.Usage({
    description: "Delete one cached month so the next fetch requests it again",
    details: `
      A cached month is never refreshed on its own, including the month that
      was still running when it was fetched. Purge it to have it fetched again.
    `,
    examples: [["Refetch October 2025 usage next time", "shipgauge cache purge usage 10-2025"]],
  });

  source = Option.String({ name: "source", required: true });
  bucket = Option.String({ name: "MM-YYYY", required: true });
  config = Option.String("-c,--config", { description: "Path to the config file" });

  async execute(): Promise<number> {
    try {
      if (!isSourceName(this.source)) {
        throw new ConfigError(`Unknown source '${this.source}', expected one of: ${SOURCE_NAMES.join(", ")}`);
      }
      const bucket = parseBucketId(this.bucket);
      const store = openStore(this.source, getCacheDir(loadConfig(this.config)));

      if (await store.remove(bucket)) {
        this.context.stdout.write(`Removed ${this.source} cache for ${formatBucketId(bucket)}\n`);
        return ExitCode.OK;
      }
      this.context.stdout.write(`No ${this.source} cache for ${formatBucketId(bucket)}\n`);
      return ExitCode.NOT_FOUND;
    } catch (err) {
      this.context.stdout.write(`${describeError(err)}\n`);
      return exitCodeFor(err);
    }
  }
}
