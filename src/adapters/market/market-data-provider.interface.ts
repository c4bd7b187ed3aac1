import { SettingsMap } from '../../config/decision.config';
import { MarketSnapshot } from '../../types/domain.types';

export interface IMarketDataProvider {
  /**
   * Current prices for one evaluation. `settings` carries the proxy values
   * used for any field the provider cannot source itself.
   */
  getSnapshot(settings: SettingsMap): Promise<MarketSnapshot>;
}
