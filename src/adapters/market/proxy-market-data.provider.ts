import { injectable } from 'tsyringe';
import { z } from 'zod';
import { SettingsMap } from '../../config/decision.config';
import { MarketSnapshot, Provenance } from '../../types/domain.types';
import { InvalidConfigError } from '../../types/error.types';
import { IMarketDataProvider } from './market-data-provider.interface';

const ProxySettingsSchema = z.object({
  TTF_USD_MMBTU: z.number().nonnegative(),
  JKM_USD_MMBTU: z.number().nonnegative().optional(),
  JKM_PREMIUM_USD_PER_MMBTU: z.number().default(0),
  FREIGHT_USD_DAY: z.number().nonnegative(),
  FREIGHT_REGIME_MULTIPLIER: z.number().nonnegative().default(1),
  FUEL_USD_PER_T: z.number().nonnegative(),
  EUA_USD_PER_TCO2: z.number().nonnegative()
});

/**
 * Offline snapshot from the settings sheet:
 *   B price = JKM_USD_MMBTU, else A price + premium
 *   freight = base rate * regime multiplier
 */
export function buildProxySnapshot(settings: SettingsMap, asof = 'latest'): MarketSnapshot {
  const validationResult = ProxySettingsSchema.safeParse(settings);
  if (!validationResult.success) {
    const issue = validationResult.error.issues[0];
    const parameter = issue.path.join('.');
    throw new InvalidConfigError(`Market proxy setting ${parameter}: ${issue.message}`, parameter);
  }

  const s = validationResult.data;
  return {
    asof,
    priceAUsdMmbtu: s.TTF_USD_MMBTU,
    priceBUsdMmbtu: s.JKM_USD_MMBTU ?? s.TTF_USD_MMBTU + s.JKM_PREMIUM_USD_PER_MMBTU,
    freightUsdDay: s.FREIGHT_USD_DAY * s.FREIGHT_REGIME_MULTIPLIER,
    fuelUsdPerT: s.FUEL_USD_PER_T,
    euaUsdPerTco2: s.EUA_USD_PER_TCO2,
    provenance: {
      priceA: Provenance.PROXY,
      priceB: Provenance.PROXY,
      freight: Provenance.PROXY,
      fuel: Provenance.PROXY,
      eua: Provenance.PROXY
    }
  };
}

@injectable()
export class ProxyMarketDataProvider implements IMarketDataProvider {
  async getSnapshot(settings: SettingsMap): Promise<MarketSnapshot> {
    return buildProxySnapshot(settings);
  }
}
