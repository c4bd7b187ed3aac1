import { MarketObservation } from '../../types/domain.types';
import { Result } from '../../types/result.types';

/**
 * Adapter for the historical market series used by backtests.
 */
export interface IHistoricalSeriesAdapter {
  /**
   * Retrieves observations between the optional ISO dates (inclusive), oldest first.
   * @returns Result with success=true and data if any rows match, success=true without data if none do, success=false on error
   */
  getSeries(from?: string, to?: string): Promise<Result<MarketObservation[]>>;
}
