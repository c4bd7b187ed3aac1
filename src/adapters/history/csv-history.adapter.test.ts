import 'reflect-metadata';
import { readFile } from 'fs/promises';
import { AppConfig } from '../../config/app.config';
import { isFailure, isNotFound, isSuccess } from '../../types/result.types';
import { CsvHistoryAdapter } from './csv-history.adapter';

jest.mock('fs/promises', () => ({
  readFile: jest.fn()
}));

const mockConfig: AppConfig = {
  data: {
    routesPath: '/fake/routes.csv',
    vesselsPath: '/fake/vessels.csv',
    carbonParamsPath: '/fake/carbon_params.csv',
    settingsPath: '/fake/config.csv',
    benchmarkPricesPath: '/fake/benchmark_prices.csv',
    auxSeriesPath: '/fake/aux_series.csv'
  },
  reportsDir: '/fake/reports',
  retry: { maxRetries: 0, baseDelay: 1, maxDelay: 1, jitterFactor: 0 },
  marketData: { source: 'proxy', priceASymbol: 'TTF=F', euaSymbol: 'CO2.L' },
  apiPort: 3001
};

// Out of order on purpose; 2024-01-04 has no auxiliary row
const BENCHMARK_CSV = [
  'date,TTF_USD_MMBTU,JKM_USD_MMBTU',
  '2024-01-03,10.5,12.0',
  '2024-01-01,10.0,11.0',
  '2024-01-02,10.2,11.8',
  '2024-01-04,10.1,11.1'
].join('\n');

const AUX_CSV = [
  'date,FREIGHT_USD_DAY,FUEL_USD_PER_T,EUA_USD_PER_TCO2',
  '2024-01-01,80000,580,70',
  '2024-01-02,82000,585,71',
  '2024-01-03,84000,590,72'
].join('\n');

describe('CsvHistoryAdapter', () => {
  let adapter: CsvHistoryAdapter;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    (readFile as jest.Mock).mockImplementation(async (filePath: string) =>
      filePath === mockConfig.data.benchmarkPricesPath ? BENCHMARK_CSV : AUX_CSV
    );
    adapter = new CsvHistoryAdapter(mockConfig);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  // Test: Inner join on date, sorted ascending
  it('should join benchmark and auxiliary rows by date', async () => {
    // Act
    const result = await adapter.getSeries();

    // Assert
    expect(isSuccess(result)).toBe(true);
    if (!isSuccess(result)) return;
    expect(result.data.map((r) => r.date)).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(result.data[2]).toEqual({
      date: '2024-01-03',
      priceAUsdMmbtu: 10.5,
      priceBUsdMmbtu: 12,
      freightUsdDay: 84000,
      fuelUsdPerT: 590,
      euaUsdPerTco2: 72
    });
    expect(result.message).toBe('3 historical observation(s) from 2024-01-01 to 2024-01-03');
    expect(warnSpy).toHaveBeenCalledWith('[History] 1 benchmark day(s) without auxiliary data dropped');
  });

  // Test: Inclusive date range filter
  it('should filter to the requested date range', async () => {
    const result = await adapter.getSeries('2024-01-02', '2024-01-03');

    expect(isSuccess(result)).toBe(true);
    if (!isSuccess(result)) return;
    expect(result.data.map((r) => r.date)).toEqual(['2024-01-02', '2024-01-03']);
  });

  // Test: Empty range is "not found", not a failure
  it('should return not found when no observation falls in range', async () => {
    const result = await adapter.getSeries('2025-01-01');

    expect(isNotFound(result)).toBe(true);
    expect(result.message).toBe('No historical observations found between 2025-01-01 and end');
  });

  // Test: Files are parsed once across calls
  it('should cache the joined series', async () => {
    await adapter.getSeries();
    await adapter.getSeries('2024-01-02');

    expect(readFile).toHaveBeenCalledTimes(2);
  });

  it('should return failure when a file cannot be read', async () => {
    (readFile as jest.Mock).mockRejectedValue(new Error('EACCES: permission denied'));

    const result = await adapter.getSeries();

    expect(isFailure(result)).toBe(true);
    expect(result.message).toBe('Failed to load historical series: EACCES: permission denied');
  });
});
