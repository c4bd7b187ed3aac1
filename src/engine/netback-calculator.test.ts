import { NotFoundError } from '../types/error.types';
import { compareNetbacks, computeNetback, NetbackComparisonRequest } from './netback-calculator';
import { marketPrices, referenceData } from './reference.fixture';
import { computeVoyage } from './voyage-model';

describe('NetbackCalculator', () => {
  const request: NetbackComparisonRequest = {
    loadPort: 'US_Gulf',
    marketA: { label: 'Europe', port: 'Rotterdam', priceUsdMmbtu: marketPrices.priceAUsdMmbtu },
    marketB: { label: 'Asia', port: 'Tokyo', priceUsdMmbtu: marketPrices.priceBUsdMmbtu },
    vesselClass: 'TFDE',
    cargoCapacityM3: 174000,
    rates: {
      freightRateUsdDay: marketPrices.freightRateUsdDay,
      fuelPriceUsdT: marketPrices.fuelPriceUsdT,
      euaPriceUsdT: marketPrices.euaPriceUsdT
    }
  };

  describe('computeNetback', () => {
    // Test: Carbon is reported apart from the other voyage costs
    it('should split voyage cost and carbon cost and subtract both from revenue', () => {
      // Arrange
      const voyage = computeVoyage(
        referenceData.routes[0],
        referenceData.vessels[0],
        request.rates,
        referenceData.carbonParams
      );

      // Act
      const result = computeNetback('Europe', 35.69, voyage);

      // Assert: 35.69 * 4,028,100 MMBtu
      expect(result.destination).toBe('Europe');
      expect(result.revenueUsd).toBeCloseTo(143762889, 2);
      expect(result.carbonCostUsd).toBeCloseTo(321780, 2);
      expect(result.voyageCostUsd).toBeCloseTo(1717841.88, 2);
      expect(result.netbackUsd).toBeCloseTo(141723267.12, 2);
      expect(result.voyage).toBe(voyage);
    });
  });

  describe('compareNetbacks', () => {
    // Test: Asia beats Europe by more than the carbon and freight penalty
    it('should return market A and market B netbacks in order', () => {
      // Act
      const [netbackA, netbackB] = compareNetbacks(referenceData, request);

      // Assert
      expect(netbackA.destination).toBe('Europe');
      expect(netbackB.destination).toBe('Asia');
      expect(netbackA.netbackUsd).toBeCloseTo(141723267.12, 2);
      expect(netbackB.netbackUsd).toBeCloseTo(149459956.43, 2);
      expect(netbackB.netbackUsd - netbackA.netbackUsd).toBeGreaterThan(100000);
    });

    // Test: Identical inputs give identical outputs
    it('should be deterministic for identical inputs', () => {
      const first = compareNetbacks(referenceData, request);
      const second = compareNetbacks(referenceData, request);

      expect(second).toEqual(first);
    });

    // Test: A destination with no route row fails loudly
    it('should throw NotFoundError when a destination has no route', () => {
      const unknown = { ...request, marketB: { ...request.marketB, port: 'Incheon' } };

      expect(() => compareNetbacks(referenceData, unknown)).toThrow(NotFoundError);
    });
  });
});
