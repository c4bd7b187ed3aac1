import { FuelType, TradeRoute } from '../types/domain.types';

// US Gulf cargo, Europe (TTF) as the contracted market, Asia (JKM) as the diversion candidate
export const DEFAULT_TRADE_ROUTE: TradeRoute = {
  loadPort: 'US_Gulf',
  marketA: { label: 'Europe', port: 'Rotterdam', benchmark: 'TTF' },
  marketB: { label: 'Asia', port: 'Tokyo', benchmark: 'JKM' },
  vesselClass: 'TFDE',
  cargoCapacityM3: 174000,
  fuelType: FuelType.VLSFO
};
