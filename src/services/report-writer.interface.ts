import { BacktestReport, EvaluationReport } from './diversion-analyzer.interface';

export interface IReportWriter {
  /** @returns paths of the files written */
  saveEvaluation(report: EvaluationReport): Promise<string[]>;
  saveBacktest(report: BacktestReport): Promise<string[]>;
}
