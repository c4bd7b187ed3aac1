import { DecisionOverrides } from '../config/decision.config';
import { BacktestResult } from '../engine/backtester';
import { RiskPack } from '../engine/risk-analyzer';
import { DecisionConfig, MarketSnapshot, TradePack, TradeRoute } from '../types/domain.types';

export interface EvaluationRequest {
  route: TradeRoute;
  overrides?: DecisionOverrides;
}

export interface BacktestRequest extends EvaluationRequest {
  from?: string;  // ISO date, inclusive
  to?: string;    // ISO date, inclusive
}

export interface EvaluationReport {
  snapshot: MarketSnapshot;
  tradePack: TradePack;
  riskPack: RiskPack;
}

export interface BacktestReport {
  route: TradeRoute;
  config: DecisionConfig;
  result: BacktestResult;
}

export interface IDiversionAnalyzer {
  evaluate(request: EvaluationRequest): Promise<EvaluationReport>;
  backtest(request: BacktestRequest): Promise<BacktestReport>;
}
