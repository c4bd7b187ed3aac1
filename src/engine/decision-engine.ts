import {
  Decision,
  DecisionResult,
  DecisionRule,
  HedgeInstruments,
  HedgeLeg,
  HedgeSide,
  NetbackResult,
} from "../types/domain.types";
import { InvalidConfigError } from "../types/error.types";

export const DEFAULT_LOT_SIZE_MMBTU = 10000;

export const DEFAULT_INSTRUMENTS: HedgeInstruments = { a: "TTF", b: "JKM" };

function assertFraction(value: number, parameter: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfigError(
      `${parameter} must be a fraction in [0, 1], got ${value}`,
      parameter,
    );
  }
}

function assertPositive(value: number, parameter: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(
      `${parameter} must be > 0, got ${value}`,
      parameter,
    );
  }
}

export function validateDecisionRule(rule: DecisionRule): void {
  assertFraction(rule.basisHaircutPct, "basisHaircutPct");
  assertPositive(rule.opsBufferUsd, "opsBufferUsd");
  assertPositive(rule.decisionBufferUsd, "decisionBufferUsd");
  assertPositive(rule.lotSizeAMmbtu, "lotSizeAMmbtu");
  assertPositive(rule.lotSizeBMmbtu, "lotSizeBMmbtu");
}

/**
 * Energy to hedge: delivered energy of the stronger-netback destination
 * (B on ties) times the coverage ratio.
 */
export function hedgeEnergyFor(
  netbackA: NetbackResult,
  netbackB: NetbackResult,
  coveragePct: number,
): number {
  assertFraction(coveragePct, "coveragePct");
  const stronger = netbackB.netbackUsd >= netbackA.netbackUsd ? netbackB : netbackA;
  return stronger.deliveredEnergyMmbtu * coveragePct;
}

/** Whole lots, rounded down. A negative energy sizes to zero lots. */
export function lotsFor(hedgeEnergyMmbtu: number, lotSizeMmbtu: number): number {
  return Math.max(0, Math.floor(hedgeEnergyMmbtu / lotSizeMmbtu));
}

/**
 * DIVERT locks the spread: long the B benchmark, short the A benchmark.
 * KEEP issues no hedge.
 */
export function buildHedgeLegs(
  decision: Decision,
  lotsA: number,
  lotsB: number,
  instruments: HedgeInstruments = DEFAULT_INSTRUMENTS,
): HedgeLeg[] {
  if (decision === Decision.KEEP) {
    return [];
  }
  return [
    { side: HedgeSide.BUY, instrument: instruments.b, lots: lotsB },
    { side: HedgeSide.SELL, instrument: instruments.a, lots: lotsA },
  ];
}

/**
 * Apply the diversion rule:
 *   deltaRaw = netbackB - netbackA
 *   deltaAdj = deltaRaw * (1 - haircut) - opsBuffer
 *   DIVERT if deltaAdj >= decisionBuffer, else KEEP
 */
export function decide(
  netbackAUsd: number,
  netbackBUsd: number,
  hedgeEnergyMmbtu: number,
  rule: DecisionRule,
  instruments: HedgeInstruments = DEFAULT_INSTRUMENTS,
): DecisionResult {
  validateDecisionRule(rule);

  const deltaNetbackRawUsd = netbackBUsd - netbackAUsd;
  const deltaNetbackAdjUsd =
    deltaNetbackRawUsd * (1 - rule.basisHaircutPct) - rule.opsBufferUsd;
  const decision =
    deltaNetbackAdjUsd >= rule.decisionBufferUsd ? Decision.DIVERT : Decision.KEEP;

  const lotsA = lotsFor(hedgeEnergyMmbtu, rule.lotSizeAMmbtu);
  const lotsB = lotsFor(hedgeEnergyMmbtu, rule.lotSizeBMmbtu);

  return {
    deltaNetbackRawUsd,
    deltaNetbackAdjUsd,
    basisHaircutPct: rule.basisHaircutPct,
    opsBufferUsd: rule.opsBufferUsd,
    decisionBufferUsd: rule.decisionBufferUsd,
    decision,
    hedgeEnergyMmbtu,
    lotsA,
    lotsB,
    hedgeLegs: buildHedgeLegs(decision, lotsA, lotsB, instruments),
  };
}
