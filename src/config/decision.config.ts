import { z } from 'zod';
import { DecisionConfig } from '../types/domain.types';
import { InvalidConfigError } from '../types/error.types';

/** Raw `param,value` settings as read from config.csv. */
export type SettingsMap = Record<string, number>;

const fraction = z.number().min(0, 'must be in [0, 1]').max(1, 'must be in [0, 1]');
const positive = z.number().positive('must be > 0');
const nonNegative = z.number().nonnegative('must be >= 0');

// Zod schema for the decision section of config.csv
const DecisionSettingsSchema = z.object({
  DECISION_BUFFER_USD: positive,
  OPS_BUFFER_USD: positive,
  BASIS_ADJUSTMENT: fraction,
  COVERAGE_PCT: fraction,
  TTF_LOT_MMBTU: positive,
  JKM_LOT_MMBTU: positive,
  STRESS_SPREAD_USD: nonNegative,
  STRESS_FREIGHT_USD_PER_DAY: nonNegative,
  STRESS_EUA_USD: nonNegative
});

export type DecisionSettings = z.infer<typeof DecisionSettingsSchema>;

/** CLI/API overrides applied on top of config.csv before validation. */
export interface DecisionOverrides {
  basisHaircutPct?: number;
  opsBufferUsd?: number;
  decisionBufferUsd?: number;
  coveragePct?: number;
}

export function parseDecisionConfig(
  settings: SettingsMap,
  overrides: DecisionOverrides = {}
): DecisionConfig {
  const merged: SettingsMap = { ...settings };
  if (overrides.basisHaircutPct !== undefined) merged.BASIS_ADJUSTMENT = overrides.basisHaircutPct;
  if (overrides.opsBufferUsd !== undefined) merged.OPS_BUFFER_USD = overrides.opsBufferUsd;
  if (overrides.decisionBufferUsd !== undefined) merged.DECISION_BUFFER_USD = overrides.decisionBufferUsd;
  if (overrides.coveragePct !== undefined) merged.COVERAGE_PCT = overrides.coveragePct;

  const validationResult = DecisionSettingsSchema.safeParse(merged);
  if (!validationResult.success) {
    const issue = validationResult.error.issues[0];
    const parameter = issue.path.join('.');
    const reason = issue.code === 'invalid_type' && issue.received === 'undefined'
      ? 'missing config key'
      : issue.message;
    throw new InvalidConfigError(`${parameter}: ${reason}`, parameter);
  }

  const s = validationResult.data;
  return {
    rule: {
      basisHaircutPct: s.BASIS_ADJUSTMENT,
      opsBufferUsd: s.OPS_BUFFER_USD,
      decisionBufferUsd: s.DECISION_BUFFER_USD,
      lotSizeAMmbtu: s.TTF_LOT_MMBTU,
      lotSizeBMmbtu: s.JKM_LOT_MMBTU
    },
    coveragePct: s.COVERAGE_PCT,
    stress: {
      spreadShockUsd: s.STRESS_SPREAD_USD,
      freightShockUsdDay: s.STRESS_FREIGHT_USD_PER_DAY,
      euaShockUsd: s.STRESS_EUA_USD
    }
  };
}
