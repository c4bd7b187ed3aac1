import { Decision, HedgeSide } from '../types/domain.types';
import { decisionConfig, marketPrices, referenceData, tradeRoute } from './reference.fixture';
import { evaluateDecision, runTradeDecision, toComparisonRequest } from './trade-decision';

describe('runTradeDecision', () => {
  const request = { route: tradeRoute, prices: marketPrices, config: decisionConfig };

  // Test: Full pipeline on the reference cargo
  it('should recommend a diversion to Asia with a sized hedge', () => {
    // Act
    const pack = runTradeDecision(referenceData, request);

    // Assert: raw 7,736,689.31; adjusted 7,736,689.31 * 0.95 - 150,000
    expect(pack.decision.deltaNetbackRawUsd).toBeCloseTo(7736689.31, 2);
    expect(pack.decision.deltaNetbackAdjUsd).toBeCloseTo(7199854.84, 2);
    expect(pack.decision.decision).toBe(Decision.DIVERT);

    // Tokyo delivers 3,988,950 MMBtu; 80 % coverage = 3,191,160 MMBtu = 319 lots
    expect(pack.decision.hedgeEnergyMmbtu).toBeCloseTo(3191160, 4);
    expect(pack.hedgeLegs).toEqual([
      { side: HedgeSide.BUY, instrument: 'JKM', lots: 319 },
      { side: HedgeSide.SELL, instrument: 'TTF', lots: 319 }
    ]);
  });

  // Test: Per-market summaries keep the leg's identity and voyage days
  it('should summarise each market leg', () => {
    const pack = runTradeDecision(referenceData, request);

    expect(pack.marketA).toMatchObject({
      label: 'Europe',
      port: 'Rotterdam',
      benchmark: 'TTF',
      priceUsdMmbtu: 35.69
    });
    expect(pack.marketA.voyageDays).toBeCloseTo(10.6838, 4);
    expect(pack.marketB).toMatchObject({ label: 'Asia', port: 'Tokyo', benchmark: 'JKM' });
    expect(pack.marketB.netbackUsd).toBeCloseTo(149459956.43, 2);
  });

  // Test: Inputs are echoed for the trade record
  it('should echo the inputs on the pack', () => {
    const pack = runTradeDecision(referenceData, request);

    expect(pack.inputs).toEqual({
      route: tradeRoute,
      prices: marketPrices,
      rule: decisionConfig.rule,
      coveragePct: 0.8
    });
  });

  // Test: Decomposition identity holds on the pipeline output
  it('should report the raw delta as netback B minus netback A', () => {
    const { netbackA, netbackB, decision } = evaluateDecision(referenceData, request);

    expect(decision.deltaNetbackRawUsd).toBe(netbackB.netbackUsd - netbackA.netbackUsd);
  });

  // Test: Flat prices leave Europe ahead and issue no hedge
  it('should KEEP with no hedge legs when prices are flat', () => {
    const flat = { ...marketPrices, priceBUsdMmbtu: marketPrices.priceAUsdMmbtu };

    const pack = runTradeDecision(referenceData, { ...request, prices: flat });

    expect(pack.decision.decision).toBe(Decision.KEEP);
    expect(pack.hedgeLegs).toEqual([]);
    // Rotterdam is now the stronger netback: 4,028,100 * 0.8
    expect(pack.decision.hedgeEnergyMmbtu).toBeCloseTo(3222480, 4);
    expect(pack.decision.lotsA).toBe(322);
  });
});

describe('toComparisonRequest', () => {
  it('should map the route and prices onto a netback comparison', () => {
    const comparison = toComparisonRequest(tradeRoute, marketPrices);

    expect(comparison).toEqual({
      loadPort: 'US_Gulf',
      marketA: { label: 'Europe', port: 'Rotterdam', priceUsdMmbtu: 35.69 },
      marketB: { label: 'Asia', port: 'Tokyo', priceUsdMmbtu: 38.44 },
      vesselClass: 'TFDE',
      cargoCapacityM3: 174000,
      fuelType: tradeRoute.fuelType,
      rates: { freightRateUsdDay: 85000, fuelPriceUsdT: 583, euaPriceUsdT: 74.4 }
    });
  });
});
