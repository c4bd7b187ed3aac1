import {
  CarbonParams,
  FuelType,
  Route,
  Vessel,
  VoyageDetails,
  VoyageRates,
} from "../types/domain.types";
import { NotFoundError } from "../types/error.types";

export const LNG_DENSITY_T_PER_M3 = 0.45;
export const ENERGY_CONTENT_MMBTU_PER_T = 52;
export const HOURS_PER_DAY = 24;

export interface VoyageOptions {
  fuelType?: FuelType;
  /** Cargo actually lifted; defaults to the vessel's capacity. */
  cargoCapacityM3?: number;
}

export function findRoute(
  routes: readonly Route[],
  loadPort: string,
  dischargePort: string,
): Route {
  const route = routes.find(
    (r) => r.loadPort === loadPort && r.dischargePort === dischargePort,
  );
  if (!route) {
    throw new NotFoundError(
      `Route not found: ${loadPort} -> ${dischargePort}`,
      `${loadPort}->${dischargePort}`,
    );
  }
  return route;
}

export function findVessel(
  vessels: readonly Vessel[],
  vesselClass: string,
): Vessel {
  const vessel = vessels.find((v) => v.vesselClass === vesselClass);
  if (!vessel) {
    throw new NotFoundError(
      `Vessel class not found: ${vesselClass}`,
      vesselClass,
    );
  }
  return vessel;
}

export function co2FactorFor(
  fuelType: FuelType,
  carbonParams: CarbonParams,
): number {
  switch (fuelType) {
    case FuelType.VLSFO:
      return carbonParams.co2FactorVlsfoTco2PerTFuel;
    case FuelType.LNG:
      return carbonParams.co2FactorLngTco2PerTFuel;
  }
}

/**
 * Laden leg only. Delivered cargo can go negative for a vessel too slow for
 * the route; the value is returned as computed.
 */
export function computeVoyage(
  route: Route,
  vessel: Vessel,
  rates: VoyageRates,
  carbonParams: CarbonParams,
  options: VoyageOptions = {},
): VoyageDetails {
  const fuelType = options.fuelType ?? FuelType.VLSFO;
  const cargoCapacityM3 = options.cargoCapacityM3 ?? vessel.cargoCapacityM3;

  const voyageDays = route.distanceNm / (vessel.ladenSpeedKn * HOURS_PER_DAY);

  const boilOffM3 = cargoCapacityM3 * (vessel.boilOffPctPerDay / 100) * voyageDays;
  const deliveredCargoM3 = cargoCapacityM3 - boilOffM3;
  const deliveredEnergyMmbtu =
    deliveredCargoM3 * LNG_DENSITY_T_PER_M3 * ENERGY_CONTENT_MMBTU_PER_T;

  const fuelConsumedTonnes = vessel.fuelConsumptionTpdLaden * voyageDays;
  const fuelCostUsd = fuelConsumedTonnes * rates.fuelPriceUsdT;
  const timeCharterCostUsd = rates.freightRateUsdDay * voyageDays;

  const carbonEmissionsTco2 = fuelConsumedTonnes * co2FactorFor(fuelType, carbonParams);
  const carbonCostUsd = carbonEmissionsTco2 * rates.euaPriceUsdT;

  return {
    distanceNm: route.distanceNm,
    voyageDays,
    boilOffM3,
    deliveredCargoM3,
    deliveredEnergyMmbtu,
    fuelConsumedTonnes,
    fuelCostUsd,
    timeCharterCostUsd,
    carbonCostUsd,
    totalVoyageCostUsd: fuelCostUsd + timeCharterCostUsd + carbonCostUsd,
  };
}
