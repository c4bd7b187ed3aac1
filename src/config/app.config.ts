import 'dotenv/config';
import * as path from 'path';
import { RetryOptions } from '../utils/retry.util';

export type MarketDataSource = 'proxy' | 'yahoo';

export interface AppConfig {
  data: {
    routesPath: string;
    vesselsPath: string;
    carbonParamsPath: string;
    settingsPath: string;
    benchmarkPricesPath: string;
    auxSeriesPath: string;
  };
  reportsDir: string;
  retry: RetryOptions;
  marketData: {
    source: MarketDataSource;
    priceASymbol: string;
    euaSymbol: string;
  };
  apiPort: number;
}

function parseNumber(name: string, fallback: string): number {
  const raw = process.env[name] || fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  const dataDir = process.env.DATA_DIR || path.join(__dirname, '../../data');

  const source = process.env.MARKET_DATA_SOURCE || 'proxy';
  if (source !== 'proxy' && source !== 'yahoo') {
    throw new Error('MARKET_DATA_SOURCE must be "proxy" or "yahoo"');
  }

  const maxRetries = parseNumber('RETRY_MAX_ATTEMPTS', '3');
  if (maxRetries < 0 || maxRetries > 10) {
    throw new Error('RETRY_MAX_ATTEMPTS must be between 0 and 10');
  }

  return {
    data: {
      routesPath: path.join(dataDir, 'routes.csv'),
      vesselsPath: path.join(dataDir, 'vessels.csv'),
      carbonParamsPath: path.join(dataDir, 'carbon_params.csv'),
      settingsPath: path.join(dataDir, 'config.csv'),
      benchmarkPricesPath: path.join(dataDir, 'benchmark_prices.csv'),
      auxSeriesPath: path.join(dataDir, 'aux_series.csv')
    },
    reportsDir: process.env.REPORTS_DIR || path.join(__dirname, '../../reports'),
    retry: {
      maxRetries,
      baseDelay: parseNumber('RETRY_BASE_DELAY_MS', '1000'),
      maxDelay: parseNumber('RETRY_MAX_DELAY_MS', '10000'),
      jitterFactor: parseNumber('RETRY_JITTER_FACTOR', '0.1')
    },
    marketData: {
      source,
      priceASymbol: process.env.MARKET_A_SYMBOL || 'TTF=F',
      euaSymbol: process.env.EUA_SYMBOL || 'CO2.L'
    },
    apiPort: parseNumber('API_PORT', '3001')
  };
}
