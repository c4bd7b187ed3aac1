import {
  FuelType,
  NetbackResult,
  ReferenceData,
  VoyageDetails,
  VoyageRates,
} from "../types/domain.types";
import { computeVoyage, findRoute, findVessel } from "./voyage-model";

export interface DestinationQuote {
  label: string;
  port: string;
  priceUsdMmbtu: number;
}

export interface NetbackComparisonRequest {
  loadPort: string;
  marketA: DestinationQuote;
  marketB: DestinationQuote;
  vesselClass: string;
  cargoCapacityM3: number;
  rates: VoyageRates;
  fuelType?: FuelType;
}

export function computeNetback(
  destination: string,
  priceUsdMmbtu: number,
  voyage: VoyageDetails,
): NetbackResult {
  const revenueUsd = priceUsdMmbtu * voyage.deliveredEnergyMmbtu;

  return {
    destination,
    priceUsdMmbtu,
    deliveredEnergyMmbtu: voyage.deliveredEnergyMmbtu,
    revenueUsd,
    voyageCostUsd: voyage.totalVoyageCostUsd - voyage.carbonCostUsd,
    carbonCostUsd: voyage.carbonCostUsd,
    netbackUsd: revenueUsd - voyage.totalVoyageCostUsd,
    voyage,
  };
}

/**
 * Netbacks for both destinations with the same vessel, fuel and carbon
 * inputs. Returned in (market A, market B) order.
 */
export function compareNetbacks(
  reference: ReferenceData,
  request: NetbackComparisonRequest,
): [NetbackResult, NetbackResult] {
  const vessel = findVessel(reference.vessels, request.vesselClass);

  const netbackFor = (quote: DestinationQuote): NetbackResult => {
    const route = findRoute(reference.routes, request.loadPort, quote.port);
    const voyage = computeVoyage(route, vessel, request.rates, reference.carbonParams, {
      fuelType: request.fuelType,
      cargoCapacityM3: request.cargoCapacityM3,
    });
    return computeNetback(quote.label, quote.priceUsdMmbtu, voyage);
  };

  return [netbackFor(request.marketA), netbackFor(request.marketB)];
}
