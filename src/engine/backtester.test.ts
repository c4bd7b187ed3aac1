import { Decision, MarketObservation } from '../types/domain.types';
import { EmptyInputError } from '../types/error.types';
import { DailyDecision, evaluateHistory, maxDrawdown, runBacktest, sharpeRatio } from './backtester';
import { decisionConfig, referenceData, tradeRoute } from './reference.fixture';

const day = (date: string, decision: Decision, deltaNetbackAdjUsd: number): DailyDecision => ({
  date,
  decision,
  deltaNetbackRawUsd: deltaNetbackAdjUsd,
  deltaNetbackAdjUsd,
  netbackAUsd: 0,
  netbackBUsd: 0
});

describe('Backtester', () => {
  describe('runBacktest', () => {
    // Test: Unsorted input is ordered by date before accumulating
    it('should accumulate triggered uplift in date order', () => {
      // Arrange
      const results = [
        day('2024-01-03', Decision.DIVERT, 100),
        day('2024-01-01', Decision.DIVERT, 300),
        day('2024-01-02', Decision.KEEP, -50),
        day('2024-01-04', Decision.KEEP, -20)
      ];

      // Act
      const backtest = runBacktest(results);

      // Assert
      expect(backtest.equityCurve).toEqual([
        { date: '2024-01-01', cumulativePnlUsd: 300 },
        { date: '2024-01-02', cumulativePnlUsd: 300 },
        { date: '2024-01-03', cumulativePnlUsd: 400 },
        { date: '2024-01-04', cumulativePnlUsd: 400 }
      ]);
      expect(backtest.metrics).toEqual({
        totalObservations: 4,
        triggeredTrades: 2,
        hitRate: 0.5,
        averageUpliftUsd: 200,
        totalUpliftUsd: 400,
        maxDrawdownUsd: 0,
        sharpeRatio: null
      });
      expect(backtest.decisionHistory[1]).toMatchObject({ triggered: false, pnlUsd: 0 });
    });

    // Test: Input order is left untouched
    it('should not reorder the caller array', () => {
      const results = [day('2024-01-02', Decision.KEEP, 0), day('2024-01-01', Decision.KEEP, 0)];

      runBacktest(results);

      expect(results.map((r) => r.date)).toEqual(['2024-01-02', '2024-01-01']);
    });

    // Test: Sharpe uses the sample standard deviation once 5 days exist
    it('should annualise the Sharpe ratio over 252 days', () => {
      const results = [
        day('2024-01-01', Decision.DIVERT, 300),
        day('2024-01-02', Decision.KEEP, 0),
        day('2024-01-03', Decision.DIVERT, 100),
        day('2024-01-04', Decision.KEEP, 0),
        day('2024-01-05', Decision.DIVERT, 200)
      ];

      const backtest = runBacktest(results);

      expect(backtest.metrics.sharpeRatio).toBeCloseTo(14.6102, 4);
    });

    // Test: No triggers gives zero averages rather than NaN
    it('should report zeros when nothing triggers', () => {
      const results = [day('2024-01-01', Decision.KEEP, -10), day('2024-01-02', Decision.KEEP, -20)];

      const { metrics } = runBacktest(results);

      expect(metrics.hitRate).toBe(0);
      expect(metrics.averageUpliftUsd).toBe(0);
      expect(metrics.totalUpliftUsd).toBe(0);
    });

    it('should throw EmptyInputError on empty input', () => {
      expect(() => runBacktest([])).toThrow(EmptyInputError);
    });
  });

  describe('maxDrawdown', () => {
    it('should measure the largest fall from a running peak', () => {
      expect(maxDrawdown([100, 300, 150, 250, 50])).toBe(250);
    });

    it('should count a fall from the first point when the curve starts negative', () => {
      expect(maxDrawdown([-10, -30])).toBe(20);
    });

    it('should be zero for a rising or empty curve', () => {
      expect(maxDrawdown([0, 10, 20])).toBe(0);
      expect(maxDrawdown([])).toBe(0);
    });
  });

  describe('sharpeRatio', () => {
    it('should be null with fewer than 5 observations', () => {
      expect(sharpeRatio([1, 2, 3, 4])).toBeNull();
    });

    it('should be null when daily P&L has no variance', () => {
      expect(sharpeRatio([100, 100, 100, 100, 100])).toBeNull();
      expect(sharpeRatio([0, 0, 0, 0, 0])).toBeNull();
    });
  });

  describe('evaluateHistory', () => {
    // Test: One decision per observation, driven by the day's prices
    it('should run the decision once per observation', () => {
      // Arrange
      const base: Omit<MarketObservation, 'date' | 'priceBUsdMmbtu'> = {
        priceAUsdMmbtu: 35.69,
        freightUsdDay: 85000,
        fuelUsdPerT: 583,
        euaUsdPerTco2: 74.4
      };
      const series: MarketObservation[] = [
        { ...base, date: '2024-03-01', priceBUsdMmbtu: 38.44 },
        { ...base, date: '2024-03-02', priceBUsdMmbtu: 35.69 }
      ];

      // Act
      const decisions = evaluateHistory(referenceData, tradeRoute, series, decisionConfig);

      // Assert
      expect(decisions.map((d) => [d.date, d.decision])).toEqual([
        ['2024-03-01', Decision.DIVERT],
        ['2024-03-02', Decision.KEEP]
      ]);
      expect(decisions[0].deltaNetbackAdjUsd).toBeCloseTo(7199854.84, 2);
      expect(decisions[1].deltaNetbackAdjUsd).toBeCloseTo(-3221277.03, 2);
    });
  });
});
