// Plain report shapes for JSON/CSV export and the console trade note.
// Monetary values are rounded to cents here and nowhere else.

import { RiskPack } from '../engine/risk-analyzer';
import { BacktestReport, EvaluationReport } from './diversion-analyzer.interface';

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface TicketRow {
  field: string;
  value: string | number;
}

export interface StressRow {
  scenario: string;
  spread_shock_usd: number;
  freight_shock_usd_day: number;
  eua_shock_usd: number;
  base_decision: string;
  stressed_decision: string;
  decision_flipped: boolean;
  pnl_impact_usd: number;
  base_delta_adj_usd: number;
  stressed_delta_adj_usd: number;
}

export interface RiskReport {
  base_decision: string;
  base_delta_netback_adj_usd: number;
  worst_case_pnl_impact_usd: number;
  scenarios_causing_decision_flip: string[];
  stress_scenarios: StressRow[];
}

export interface BacktestSummary {
  total_observations: number;
  triggered_trades: number;
  hit_rate_pct: number;
  average_uplift_usd: number;
  total_uplift_usd: number;
  max_drawdown_usd: number;
  sharpe_ratio: number | null;
}

export interface BacktestReportDocument {
  backtest_summary: BacktestSummary;
  equity_curve: Array<{ date: string; cumulative_pnl_usd: number }>;
}

/** Flat key/value ticket for desk review. */
export function buildTradeTicketRows(report: EvaluationReport): TicketRow[] {
  const { tradePack, snapshot } = report;
  const { decision, marketA, marketB, inputs } = tradePack;

  const rows: TicketRow[] = [
    { field: 'asof', value: snapshot.asof },
    { field: 'load_port', value: inputs.route.loadPort },
    { field: 'market_a', value: `${marketA.label} (${marketA.port})` },
    { field: 'market_b', value: `${marketB.label} (${marketB.port})` },
    { field: 'vessel_class', value: inputs.route.vesselClass },
    { field: 'cargo_capacity_m3', value: inputs.route.cargoCapacityM3 },
    { field: `${marketA.benchmark.toLowerCase()}_price_usd_mmbtu`, value: marketA.priceUsdMmbtu },
    { field: `${marketB.benchmark.toLowerCase()}_price_usd_mmbtu`, value: marketB.priceUsdMmbtu },
    { field: 'netback_a_usd', value: round2(marketA.netbackUsd) },
    { field: 'netback_b_usd', value: round2(marketB.netbackUsd) },
    { field: 'delta_netback_raw_usd', value: round2(decision.deltaNetbackRawUsd) },
    { field: 'delta_netback_adj_usd', value: round2(decision.deltaNetbackAdjUsd) },
    { field: 'basis_haircut_pct', value: decision.basisHaircutPct },
    { field: 'ops_buffer_usd', value: decision.opsBufferUsd },
    { field: 'decision_buffer_usd', value: decision.decisionBufferUsd },
    { field: 'decision', value: decision.decision },
    { field: 'hedge_energy_mmbtu', value: round2(decision.hedgeEnergyMmbtu) }
  ];

  for (const leg of tradePack.hedgeLegs) {
    rows.push({ field: `hedge_${leg.side.toLowerCase()}_${leg.instrument.toLowerCase()}_lots`, value: leg.lots });
  }

  return rows;
}

export function buildStressRows(riskPack: RiskPack): StressRow[] {
  return riskPack.stressResults.map(sr => ({
    scenario: sr.scenario.name,
    spread_shock_usd: sr.scenario.spreadShockUsd,
    freight_shock_usd_day: sr.scenario.freightShockUsdDay,
    eua_shock_usd: sr.scenario.euaShockUsd,
    base_decision: sr.baseDecision,
    stressed_decision: sr.stressedDecision,
    decision_flipped: sr.decisionChange,
    pnl_impact_usd: round2(sr.pnlImpactUsd),
    base_delta_adj_usd: round2(sr.baseDeltaNetbackAdjUsd),
    stressed_delta_adj_usd: round2(sr.stressedDeltaNetbackAdjUsd)
  }));
}

export function buildRiskReport(riskPack: RiskPack): RiskReport {
  return {
    base_decision: riskPack.baseResult.decision,
    base_delta_netback_adj_usd: round2(riskPack.baseResult.deltaNetbackAdjUsd),
    worst_case_pnl_impact_usd: round2(riskPack.worstCasePnlImpactUsd),
    scenarios_causing_decision_flip: [...riskPack.scenariosCausingFlip],
    stress_scenarios: buildStressRows(riskPack)
  };
}

export function buildBacktestReport(report: BacktestReport): BacktestReportDocument {
  const { metrics, equityCurve } = report.result;

  return {
    backtest_summary: {
      total_observations: metrics.totalObservations,
      triggered_trades: metrics.triggeredTrades,
      hit_rate_pct: round2(metrics.hitRate * 100),
      average_uplift_usd: round2(metrics.averageUpliftUsd),
      total_uplift_usd: round2(metrics.totalUpliftUsd),
      max_drawdown_usd: round2(metrics.maxDrawdownUsd),
      sharpe_ratio: metrics.sharpeRatio === null ? null : Math.round(metrics.sharpeRatio * 1000) / 1000
    },
    equity_curve: equityCurve.map(point => ({
      date: point.date,
      cumulative_pnl_usd: round2(point.cumulativePnlUsd)
    }))
  };
}

const usdFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0
});

function usd(value: number): string {
  return usdFormatter.format(value);
}

export function formatTradeNote(report: EvaluationReport): string {
  const { snapshot, tradePack, riskPack } = report;
  const { inputs, marketA, marketB, decision, hedgeLegs } = tradePack;
  const rule = inputs.rule;
  const divider = '-'.repeat(60);

  const lines = [
    '='.repeat(60),
    'LNG DIVERSION TRADE NOTE',
    '='.repeat(60),
    `Route: ${inputs.route.loadPort} -> ${marketA.port} (${marketA.benchmark}) vs ${marketB.port} (${marketB.benchmark})`,
    `Vessel: ${inputs.route.vesselClass} | Cargo: ${inputs.route.cargoCapacityM3.toLocaleString('en-US')} m3`,
    `As of: ${snapshot.asof}`,
    divider,
    `${marketA.benchmark}: $${snapshot.priceAUsdMmbtu.toFixed(2)}/MMBtu (${snapshot.provenance.priceA})`,
    `${marketB.benchmark}: $${snapshot.priceBUsdMmbtu.toFixed(2)}/MMBtu (${snapshot.provenance.priceB})`,
    `Freight: ${usd(snapshot.freightUsdDay)}/day (${snapshot.provenance.freight})`,
    `Fuel: ${usd(snapshot.fuelUsdPerT)}/t (${snapshot.provenance.fuel})`,
    `EUA: $${snapshot.euaUsdPerTco2.toFixed(2)}/tCO2 (${snapshot.provenance.eua})`,
    divider,
    `${marketA.label} netback: ${usd(marketA.netbackUsd)}`,
    `${marketB.label} netback: ${usd(marketB.netbackUsd)}`,
    `Raw uplift: ${usd(decision.deltaNetbackRawUsd)}`,
    `Adjusted uplift: ${usd(decision.deltaNetbackAdjUsd)}`,
    `  (basis=${(rule.basisHaircutPct * 100).toFixed(1)}%, ops=${usd(rule.opsBufferUsd)}, threshold=${usd(rule.decisionBufferUsd)})`,
    divider,
    `Decision: ${decision.decision}`
  ];

  if (hedgeLegs.length > 0) {
    lines.push(`Hedge: ${hedgeLegs.map(leg => `${leg.side} ${leg.instrument} ${leg.lots} lots`).join(' | ')}`);
  } else {
    lines.push('Hedge: none');
  }

  lines.push(divider, `Worst case stress P&L impact: ${usd(riskPack.worstCasePnlImpactUsd)}`);
  lines.push(
    riskPack.scenariosCausingFlip.length > 0
      ? `Scenarios causing decision flip: ${riskPack.scenariosCausingFlip.join(', ')}`
      : 'No scenario flips the decision'
  );
  lines.push('='.repeat(60));

  return lines.join('\n');
}
