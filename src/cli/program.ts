import { Builtins, Cli } from "clipanion";
import { CacheListCommand, CachePurgeCommand } from "./commands/cache.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { FetchCommand } from "./commands/fetch.js";
import {
  ReportBillingCommand,
  ReportDeliveryCommand,
  ReportSeatsCommand,
} from "./commands/report.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Shipgauge",
    binaryName: "shipgauge",
    binaryVersion: "0.1.0",
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  cli.register(FetchCommand);

  // Report commands
  cli.register(ReportBillingCommand);
  cli.register(ReportDeliveryCommand);
  cli.register(ReportSeatsCommand);

  // Cache commands
  cli.register(CacheListCommand);
  cli.register(CachePurgeCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
