import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { stringify } from 'csv-stringify';
import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import { BacktestReport, EvaluationReport } from './diversion-analyzer.interface';
import {
  buildBacktestReport,
  buildRiskReport,
  buildStressRows,
  buildTradeTicketRows
} from './report-builder';
import { IReportWriter } from './report-writer.interface';

/** UTC timestamp tag used in report file names, e.g. 20250720_143000. */
export function timestampTag(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

const STRESS_COLUMNS = [
  'scenario',
  'spread_shock_usd',
  'freight_shock_usd_day',
  'eua_shock_usd',
  'base_decision',
  'stressed_decision',
  'decision_flipped',
  'pnl_impact_usd',
  'base_delta_adj_usd',
  'stressed_delta_adj_usd'
];

const HISTORY_COLUMNS = [
  'date',
  'decision',
  'delta_netback_raw_usd',
  'delta_netback_adj_usd',
  'netback_a_usd',
  'netback_b_usd',
  'triggered',
  'pnl_usd',
  'cumulative_pnl_usd'
];

function toCsv(records: object[], columns: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(records, { header: true, columns }, (err, output) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(output);
    });
  });
}

@injectable()
export class ReportWriterService implements IReportWriter {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async saveEvaluation(report: EvaluationReport): Promise<string[]> {
    const tag = timestampTag(new Date());

    return this.writeAll([
      [`trade_pack_${tag}.json`, JSON.stringify(report.tradePack, null, 2)],
      [`trade_ticket_${tag}.csv`, await toCsv(buildTradeTicketRows(report), ['field', 'value'])],
      [`risk_report_${tag}.json`, JSON.stringify(buildRiskReport(report.riskPack), null, 2)],
      [`stress_pack_${tag}.csv`, await toCsv(buildStressRows(report.riskPack), STRESS_COLUMNS)]
    ]);
  }

  async saveBacktest(report: BacktestReport): Promise<string[]> {
    const tag = timestampTag(new Date());
    const history = report.result.decisionHistory.map(row => ({
      date: row.date,
      decision: row.decision,
      delta_netback_raw_usd: row.deltaNetbackRawUsd,
      delta_netback_adj_usd: row.deltaNetbackAdjUsd,
      netback_a_usd: row.netbackAUsd,
      netback_b_usd: row.netbackBUsd,
      triggered: row.triggered ? 1 : 0,
      pnl_usd: row.pnlUsd,
      cumulative_pnl_usd: row.cumulativePnlUsd
    }));
    const equityCurve = report.result.equityCurve.map(point => ({
      date: point.date,
      cumulative_pnl_usd: point.cumulativePnlUsd
    }));

    return this.writeAll([
      [`backtest_report_${tag}.json`, JSON.stringify(buildBacktestReport(report), null, 2)],
      [`equity_curve_${tag}.csv`, await toCsv(equityCurve, ['date', 'cumulative_pnl_usd'])],
      [`backtest_trades_${tag}.csv`, await toCsv(history, HISTORY_COLUMNS)]
    ]);
  }

  private async writeAll(files: Array<[string, string]>): Promise<string[]> {
    await mkdir(this.config.reportsDir, { recursive: true });

    const written: string[] = [];
    for (const [name, content] of files) {
      const filePath = path.join(this.config.reportsDir, name);
      await writeFile(filePath, content, 'utf-8');
      console.log(`[Reports] Saved: ${filePath}`);
      written.push(filePath);
    }
    return written;
  }
}
