import { parseArgs } from 'util';
import { z } from 'zod';
import { TradeRoute } from '../types/domain.types';
import { DecisionOverrides } from './decision.config';
import { DEFAULT_TRADE_ROUTE } from './trade-route.defaults';

export interface CliOptions {
  route: TradeRoute;
  overrides: DecisionOverrides;
  save: boolean;
  backtest: boolean;
  from?: string;
  to?: string;
}

const numericFlag = z
  .string()
  .trim()
  .min(1, 'must be a number')
  .pipe(z.coerce.number({ invalid_type_error: 'must be a number' }).refine(Number.isFinite, 'must be a number'));
const positiveFlag = numericFlag.refine((value) => value > 0, 'must be > 0');
const isoDateFlag = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD');

function parseFlag<T>(
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  flag: string,
  raw: string | undefined
): T | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`--${flag} ${result.error.issues[0].message}, got "${raw}"`);
  }
  return result.data;
}

export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      'load-port': { type: 'string' },
      'market-a-port': { type: 'string' },
      'market-b-port': { type: 'string' },
      'vessel-class': { type: 'string' },
      'cargo-m3': { type: 'string' },
      basis: { type: 'string' },
      'ops-buffer': { type: 'string' },
      'decision-buffer': { type: 'string' },
      coverage: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
      save: { type: 'boolean', default: false },
      backtest: { type: 'boolean', default: false }
    },
    strict: true
  });

  const defaults = DEFAULT_TRADE_ROUTE;

  return {
    route: {
      ...defaults,
      loadPort: values['load-port'] ?? defaults.loadPort,
      marketA: { ...defaults.marketA, port: values['market-a-port'] ?? defaults.marketA.port },
      marketB: { ...defaults.marketB, port: values['market-b-port'] ?? defaults.marketB.port },
      vesselClass: values['vessel-class'] ?? defaults.vesselClass,
      cargoCapacityM3: parseFlag(positiveFlag, 'cargo-m3', values['cargo-m3']) ?? defaults.cargoCapacityM3
    },
    overrides: {
      basisHaircutPct: parseFlag(numericFlag, 'basis', values.basis),
      opsBufferUsd: parseFlag(numericFlag, 'ops-buffer', values['ops-buffer']),
      decisionBufferUsd: parseFlag(numericFlag, 'decision-buffer', values['decision-buffer']),
      coveragePct: parseFlag(numericFlag, 'coverage', values.coverage)
    },
    save: values.save ?? false,
    backtest: values.backtest ?? false,
    from: parseFlag(isoDateFlag, 'from', values.from),
    to: parseFlag(isoDateFlag, 'to', values.to)
  };
}
