import {
  DecisionResult,
  MarketLeg,
  MarketPrices,
  NetbackResult,
  NetbackSummary,
  ReferenceData,
  TradeDecisionRequest,
  TradePack,
  TradeRoute,
} from "../types/domain.types";
import { decide, hedgeEnergyFor } from "./decision-engine";
import { compareNetbacks, NetbackComparisonRequest } from "./netback-calculator";

export function toComparisonRequest(
  route: TradeRoute,
  prices: MarketPrices,
): NetbackComparisonRequest {
  return {
    loadPort: route.loadPort,
    marketA: { label: route.marketA.label, port: route.marketA.port, priceUsdMmbtu: prices.priceAUsdMmbtu },
    marketB: { label: route.marketB.label, port: route.marketB.port, priceUsdMmbtu: prices.priceBUsdMmbtu },
    vesselClass: route.vesselClass,
    cargoCapacityM3: route.cargoCapacityM3,
    fuelType: route.fuelType,
    rates: {
      freightRateUsdDay: prices.freightRateUsdDay,
      fuelPriceUsdT: prices.fuelPriceUsdT,
      euaPriceUsdT: prices.euaPriceUsdT,
    },
  };
}

function summarize(leg: MarketLeg, netback: NetbackResult): NetbackSummary {
  return {
    label: leg.label,
    port: leg.port,
    benchmark: leg.benchmark,
    priceUsdMmbtu: netback.priceUsdMmbtu,
    netbackUsd: netback.netbackUsd,
    revenueUsd: netback.revenueUsd,
    voyageCostUsd: netback.voyageCostUsd,
    carbonCostUsd: netback.carbonCostUsd,
    deliveredEnergyMmbtu: netback.deliveredEnergyMmbtu,
    voyageDays: netback.voyage.voyageDays,
  };
}

/**
 * Netbacks for both markets, the hedge sized off the stronger destination,
 * and the DIVERT/KEEP call, in one call.
 */
export function evaluateDecision(
  reference: ReferenceData,
  request: TradeDecisionRequest,
): { netbackA: NetbackResult; netbackB: NetbackResult; decision: DecisionResult } {
  const { route, prices, config } = request;
  const [netbackA, netbackB] = compareNetbacks(reference, toComparisonRequest(route, prices));

  const decision = decide(
    netbackA.netbackUsd,
    netbackB.netbackUsd,
    hedgeEnergyFor(netbackA, netbackB, config.coveragePct),
    config.rule,
    { a: route.marketA.benchmark, b: route.marketB.benchmark },
  );

  return { netbackA, netbackB, decision };
}

export function runTradeDecision(
  reference: ReferenceData,
  request: TradeDecisionRequest,
): TradePack {
  const { netbackA, netbackB, decision } = evaluateDecision(reference, request);

  return {
    inputs: {
      route: request.route,
      prices: request.prices,
      rule: request.config.rule,
      coveragePct: request.config.coveragePct,
    },
    marketA: summarize(request.route.marketA, netbackA),
    marketB: summarize(request.route.marketB, netbackB),
    decision,
    hedgeLegs: decision.hedgeLegs,
  };
}
