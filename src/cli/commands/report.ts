import { Command, Option } from "clipanion";
import { getOutputDir } from "../../config/paths.js";
import type { ShipgaugeConfig } from "../../config/types.js";
import { runBillingReport, runDeliveryReport, runSeatReport } from "../../pipeline.js";
import type { Report } from "../../report/assembler.js";
import { reportPath, writeReport } from "../../report/writer.js";
import { RangeCommand } from "../base.js";
import { ExitCode } from "../exit-codes.js";

function hours(value: number | null): string {
  return value === null ? "n/a" : `${value} h`;
}

export abstract class ReportCommand extends RangeCommand {
  offline = Option.Boolean("--offline", false, {
    description: "Use cached months only; months never fetched are left out",
  });

  output = Option.String("-o,--output", {
    description: "Where to write the JSON report (default: <outputDir>/<kind>-report.json)",
  });

  protected async write(config: ShipgaugeConfig, report: Report): Promise<void> {
    const path = await writeReport(this.output ?? reportPath(getOutputDir(config), report), report);
    this.context.stdout.write(`Report written to ${path}\n`);
    if (report.dataQuality.length > 0) {
      this.context.stdout.write("Data quality:\n");
      this.printQuality(report.dataQuality);
    }
  }
}

export class ReportBillingCommand extends ReportCommand {
  static override paths = [["report", "billing"]];

  static override usage = Command.Usage({
    description: "Roll chargeable usage into monthly spend and user/model rankings",
    examples: [
      ["Billing for the configured range", "shipgauge report billing"],
      ["Billing from the cache only", "shipgauge report billing --offline"],
    ],
  });

  async execute(): Promise<number> {
    try {
      const config = this.loadConfig();
      const ctx = this.pipelineContext(config, this.offline);
      const report = await runBillingReport(ctx, this.buckets(config, ctx.now));

      const out = this.context.stdout;
      out.write(
        `Billing ${report.period.from}..${report.period.to}: $${report.totals.costDollars.toFixed(2)}` +
          ` over ${report.totals.billableEvents} chargeable events\n`,
      );
      for (const month of report.monthly) {
        out.write(`  ${month.label}: $${month.costDollars.toFixed(2)}\n`);
      }
      const top = report.topUsers[0];
      if (top) out.write(`Top spender: ${top.email} ($${top.costDollars.toFixed(2)})\n`);

      await this.write(config, report);
      return ExitCode.OK;
    } catch (err) {
      return this.fail(err);
    }
  }
}

export class ReportDeliveryCommand extends ReportCommand {
  static override paths = [["report", "delivery"]];

  static override usage = Command.Usage({
    description: "Change lead time, cycle time and bug resolution time from pull requests and issues",
    examples: [["Delivery metrics for the last three months", "shipgauge report delivery --months 3"]],
  });

  async execute(): Promise<number> {
    try {
      const config = this.loadConfig();
      const ctx = this.pipelineContext(config, this.offline);
      const report = await runDeliveryReport(ctx, this.buckets(config, ctx.now));

      const out = this.context.stdout;
      const { pullRequests, leadTime, cycleTime, bugResolution } = report;
      out.write(`Pull requests: ${pullRequests.total} total, ${pullRequests.matched} matched\n`);
      out.write(
        `Lead time: median ${hours(leadTime.medianHours)}, mean ${hours(leadTime.meanHours)} (n=${leadTime.count})\n`,
      );
      out.write(
        `Cycle time: median ${hours(cycleTime.medianHours)}, mean ${hours(cycleTime.meanHours)}` +
          ` (completed=${cycleTime.count}, in progress=${cycleTime.inProgress})\n`,
      );
      out.write(
        `Bug resolution: median ${hours(bugResolution.medianHours)}, mean ${hours(bugResolution.meanHours)}` +
          ` (resolved=${bugResolution.count})\n`,
      );

      await this.write(config, report);
      return ExitCode.OK;
    } catch (err) {
      return this.fail(err);
    }
  }
}

export class ReportSeatsCommand extends ReportCommand {
  static override paths = [["report", "seats"]];

  static override usage = Command.Usage({
    description: "Find seat holders without recent usage",
    details: `
      Team members always come from the API. Activity is the latest usage event
      of each member, read back far enough to judge the longest configured
      threshold in days. Request counts and monthly active users cover the range.
    `,
    examples: [["Idle seats over the last three months", "shipgauge report seats --months 3"]],
  });

  async execute(): Promise<number> {
    try {
      const config = this.loadConfig();
      const ctx = this.pipelineContext(config, this.offline);
      const report = await runSeatReport(ctx, this.buckets(config, ctx.now));

      const out = this.context.stdout;
      out.write(
        `Seats: ${report.members.active} active, ${report.members.removed} removed,` +
          ` adoption ${report.adoptionRate}%\n`,
      );
      for (const idle of report.idle) {
        out.write(`  idle > ${idle.thresholdDays} days: ${idle.count}\n`);
      }
      out.write(`  never used: ${report.neverUsed.length}\n`);
      out.write(
        `  requests: ${report.usage.totalRequests},` +
          ` active users last month: ${report.usage.currentMonthActiveUsers}\n`,
      );

      await this.write(config, report);
      return ExitCode.OK;
    } catch (err) {
      return this.fail(err);
    }
  }
}
