import "reflect-metadata";
import { container } from "tsyringe";
import { loadConfig } from "./config/app.config";
import { parseCliOptions } from "./config/cli.options";
import { setupDI } from "./config/di.setup";
import { IDiversionAnalyzer } from "./services/diversion-analyzer.interface";
import { buildBacktestReport, formatTradeNote } from "./services/report-builder";
import { IReportWriter } from "./services/report-writer.interface";

async function main() {
  try {
    const options = parseCliOptions(process.argv.slice(2));
    const config = loadConfig();
    setupDI(config);

    const analyzer = container.resolve<IDiversionAnalyzer>("IDiversionAnalyzer");
    const reportWriter = container.resolve<IReportWriter>("IReportWriter");

    if (options.backtest) {
      const report = await analyzer.backtest({
        route: options.route,
        overrides: options.overrides,
        from: options.from,
        to: options.to,
      });

      console.log("\nRule validation (backtest):");
      console.log("Measures trigger frequency and conditional uplift, not trading P&L.");
      console.log(JSON.stringify(buildBacktestReport(report).backtest_summary, null, 2));

      if (options.save) {
        await reportWriter.saveBacktest(report);
      }
      process.exit(0);
    }

    const report = await analyzer.evaluate({
      route: options.route,
      overrides: options.overrides,
    });

    console.log(`\n${formatTradeNote(report)}\n`);

    if (options.save) {
      await reportWriter.saveEvaluation(report);
    }
    process.exit(0);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

main();
