/**
 * Historical validation of the diversion rule.
 *
 * Measures trigger frequency and conditional uplift: a KEEP day books no
 * P&L. This is not trading P&L (no slippage, basis realisation or hedge cost).
 */

import {
  Decision,
  DecisionConfig,
  MarketObservation,
  ReferenceData,
  TradeRoute,
} from "../types/domain.types";
import { EmptyInputError } from "../types/error.types";
import { evaluateDecision } from "./trade-decision";

export const TRADING_DAYS_PER_YEAR = 252;
export const MIN_OBSERVATIONS_FOR_SHARPE = 5;

export interface DailyDecision {
  date: string;  // ISO 8601 date
  decision: Decision;
  deltaNetbackRawUsd: number;
  deltaNetbackAdjUsd: number;
  netbackAUsd: number;
  netbackBUsd: number;
}

export interface BacktestHistoryRow extends DailyDecision {
  triggered: boolean;
  pnlUsd: number;
  cumulativePnlUsd: number;
}

export interface EquityPoint {
  date: string;
  cumulativePnlUsd: number;
}

export interface BacktestMetrics {
  totalObservations: number;
  triggeredTrades: number;
  hitRate: number;
  averageUpliftUsd: number;
  totalUpliftUsd: number;
  maxDrawdownUsd: number;
  sharpeRatio: number | null;  // null means insufficient data
}

export interface BacktestResult {
  metrics: BacktestMetrics;
  equityCurve: EquityPoint[];
  decisionHistory: BacktestHistoryRow[];
}

/**
 * Run the trade decision once per historical observation. Rows are
 * independent; only the order of the output matters downstream.
 */
export function evaluateHistory(
  reference: ReferenceData,
  route: TradeRoute,
  series: readonly MarketObservation[],
  config: DecisionConfig,
): DailyDecision[] {
  return series.map((row) => {
    const { netbackA, netbackB, decision } = evaluateDecision(reference, {
      route,
      config,
      prices: {
        priceAUsdMmbtu: row.priceAUsdMmbtu,
        priceBUsdMmbtu: row.priceBUsdMmbtu,
        freightRateUsdDay: row.freightUsdDay,
        fuelPriceUsdT: row.fuelUsdPerT,
        euaPriceUsdT: row.euaUsdPerTco2,
      },
    });

    return {
      date: row.date,
      decision: decision.decision,
      deltaNetbackRawUsd: decision.deltaNetbackRawUsd,
      deltaNetbackAdjUsd: decision.deltaNetbackAdjUsd,
      netbackAUsd: netbackA.netbackUsd,
      netbackBUsd: netbackB.netbackUsd,
    };
  });
}

export function maxDrawdown(cumulativePnl: readonly number[]): number {
  let runningMax = Number.NEGATIVE_INFINITY;
  let worst = 0;
  for (const value of cumulativePnl) {
    runningMax = Math.max(runningMax, value);
    worst = Math.max(worst, runningMax - value);
  }
  return worst;
}

/** Annualised mean/std of daily P&L using the sample standard deviation. */
export function sharpeRatio(dailyPnl: readonly number[]): number | null {
  const n = dailyPnl.length;
  if (n < MIN_OBSERVATIONS_FOR_SHARPE) {
    return null;
  }

  const mean = dailyPnl.reduce((sum, v) => sum + v, 0) / n;
  const variance = dailyPnl.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1);
  const std = Math.sqrt(variance);
  if (!(std > 0)) {
    return null;
  }

  return (mean / std) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

export function runBacktest(results: readonly DailyDecision[]): BacktestResult {
  if (results.length === 0) {
    throw new EmptyInputError("No results to backtest");
  }

  // Cumulative P&L and drawdown are order-sensitive
  const ordered = [...results].sort((a, b) => a.date.localeCompare(b.date));

  let cumulative = 0;
  const decisionHistory: BacktestHistoryRow[] = ordered.map((row) => {
    const triggered = row.decision === Decision.DIVERT;
    const pnlUsd = triggered ? row.deltaNetbackAdjUsd : 0;
    cumulative += pnlUsd;
    return { ...row, triggered, pnlUsd, cumulativePnlUsd: cumulative };
  });

  const triggeredRows = decisionHistory.filter((row) => row.triggered);
  const totalUpliftUsd = triggeredRows.reduce((sum, row) => sum + row.deltaNetbackAdjUsd, 0);
  const cumulativeSeries = decisionHistory.map((row) => row.cumulativePnlUsd);

  return {
    metrics: {
      totalObservations: decisionHistory.length,
      triggeredTrades: triggeredRows.length,
      hitRate: triggeredRows.length / decisionHistory.length,
      averageUpliftUsd: triggeredRows.length > 0 ? totalUpliftUsd / triggeredRows.length : 0,
      totalUpliftUsd,
      maxDrawdownUsd: maxDrawdown(cumulativeSeries),
      sharpeRatio: sharpeRatio(decisionHistory.map((row) => row.pnlUsd)),
    },
    equityCurve: decisionHistory.map((row) => ({
      date: row.date,
      cumulativePnlUsd: row.cumulativePnlUsd,
    })),
    decisionHistory,
  };
}
