import {
  Decision,
  DecisionConfig,
  DecisionResult,
  MarketPrices,
  ReferenceData,
  StressMagnitudes,
  TradeRoute,
} from "../types/domain.types";
import { InvalidConfigError } from "../types/error.types";
import { evaluateDecision } from "./trade-decision";

export enum StressScenarioName {
  SPREAD_COLLAPSE = "Spread Collapse",
  SPREAD_WIDEN = "Spread Widen",
  FREIGHT_SPIKE = "Freight Spike",
  FREIGHT_DROP = "Freight Drop",
  EUA_SPIKE = "EUA Spike",
  COMBINED_ADVERSE = "Combined Adverse",
}

export interface StressScenario {
  readonly name: StressScenarioName;
  readonly spreadShockUsd: number;
  readonly freightShockUsdDay: number;
  readonly euaShockUsd: number;
}

export interface StressResult {
  readonly scenario: StressScenario;
  readonly baseDeltaNetbackAdjUsd: number;
  readonly stressedDeltaNetbackAdjUsd: number;
  readonly pnlImpactUsd: number;
  readonly decisionChange: boolean;
  readonly baseDecision: Decision;
  readonly stressedDecision: Decision;
}

export interface RiskPack {
  readonly baseResult: DecisionResult;
  readonly stressResults: readonly StressResult[];
  readonly worstCasePnlImpactUsd: number;
  readonly scenariosCausingFlip: readonly StressScenarioName[];
}

type ShockTriple = Omit<StressScenario, "name">;

const SCENARIO_SHOCKS = {
  [StressScenarioName.SPREAD_COLLAPSE]: (m) => ({ spreadShockUsd: -m.spreadShockUsd, freightShockUsdDay: 0, euaShockUsd: 0 }),
  [StressScenarioName.SPREAD_WIDEN]: (m) => ({ spreadShockUsd: m.spreadShockUsd, freightShockUsdDay: 0, euaShockUsd: 0 }),
  [StressScenarioName.FREIGHT_SPIKE]: (m) => ({ spreadShockUsd: 0, freightShockUsdDay: m.freightShockUsdDay, euaShockUsd: 0 }),
  [StressScenarioName.FREIGHT_DROP]: (m) => ({ spreadShockUsd: 0, freightShockUsdDay: -m.freightShockUsdDay, euaShockUsd: 0 }),
  [StressScenarioName.EUA_SPIKE]: (m) => ({ spreadShockUsd: 0, freightShockUsdDay: 0, euaShockUsd: m.euaShockUsd }),
  [StressScenarioName.COMBINED_ADVERSE]: (m) => ({
    spreadShockUsd: -m.spreadShockUsd,
    freightShockUsdDay: m.freightShockUsdDay,
    euaShockUsd: m.euaShockUsd,
  }),
} satisfies Record<StressScenarioName, (magnitudes: StressMagnitudes) => ShockTriple>;

export const STRESS_SCENARIO_NAMES: readonly StressScenarioName[] = [
  StressScenarioName.SPREAD_COLLAPSE,
  StressScenarioName.SPREAD_WIDEN,
  StressScenarioName.FREIGHT_SPIKE,
  StressScenarioName.FREIGHT_DROP,
  StressScenarioName.EUA_SPIKE,
  StressScenarioName.COMBINED_ADVERSE,
];

export function validateStressMagnitudes(magnitudes: StressMagnitudes): void {
  const checks: Array<[keyof StressMagnitudes, number]> = [
    ["spreadShockUsd", magnitudes.spreadShockUsd],
    ["freightShockUsdDay", magnitudes.freightShockUsdDay],
    ["euaShockUsd", magnitudes.euaShockUsd],
  ];
  for (const [parameter, value] of checks) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidConfigError(`${parameter} must be >= 0, got ${value}`, parameter);
    }
  }
}

export function buildStressScenarios(magnitudes: StressMagnitudes): StressScenario[] {
  validateStressMagnitudes(magnitudes);
  return STRESS_SCENARIO_NAMES.map((name) => ({ name, ...SCENARIO_SHOCKS[name](magnitudes) }));
}

export function applyShock(prices: MarketPrices, scenario: StressScenario): MarketPrices {
  return {
    ...prices,
    priceBUsdMmbtu: prices.priceBUsdMmbtu + scenario.spreadShockUsd,
    freightRateUsdDay: prices.freightRateUsdDay + scenario.freightShockUsdDay,
    euaPriceUsdT: prices.euaPriceUsdT + scenario.euaShockUsd,
  };
}

/**
 * Re-run netbacks and the decision under each fixed scenario, keeping the
 * base case's decision rule and hedge policy.
 */
export function runStressTest(
  baseResult: DecisionResult,
  reference: ReferenceData,
  route: TradeRoute,
  prices: MarketPrices,
  config: DecisionConfig,
): RiskPack {
  const stressResults = buildStressScenarios(config.stress).map((scenario): StressResult => {
    const { decision: stressed } = evaluateDecision(reference, {
      route,
      prices: applyShock(prices, scenario),
      config,
    });

    return {
      scenario,
      baseDeltaNetbackAdjUsd: baseResult.deltaNetbackAdjUsd,
      stressedDeltaNetbackAdjUsd: stressed.deltaNetbackAdjUsd,
      pnlImpactUsd: stressed.deltaNetbackAdjUsd - baseResult.deltaNetbackAdjUsd,
      decisionChange: stressed.decision !== baseResult.decision,
      baseDecision: baseResult.decision,
      stressedDecision: stressed.decision,
    };
  });

  return {
    baseResult,
    stressResults,
    worstCasePnlImpactUsd: Math.min(...stressResults.map((r) => r.pnlImpactUsd)),
    scenariosCausingFlip: stressResults.filter((r) => r.decisionChange).map((r) => r.scenario.name),
  };
}
