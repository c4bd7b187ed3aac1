import {
  DecisionConfig,
  FuelType,
  MarketPrices,
  ReferenceData,
  TradeRoute,
} from "../types/domain.types";

// TFDE 174k m3, 19.5 kn, 0.10 %/day boil-off, 130 t/day laden burn
export const referenceData: ReferenceData = {
  routes: [
    { loadPort: "US_Gulf", dischargePort: "Rotterdam", distanceNm: 5000 },
    { loadPort: "US_Gulf", dischargePort: "Tokyo", distanceNm: 9500 },
  ],
  vessels: [
    {
      vesselClass: "TFDE",
      cargoCapacityM3: 174000,
      ladenSpeedKn: 19.5,
      ballastSpeedKn: 19.5,
      boilOffPctPerDay: 0.1,
      fuelConsumptionTpdLaden: 130,
      fuelConsumptionTpdBallast: 120,
    },
  ],
  carbonParams: {
    euaPriceUsdPerT: 74.4,
    co2FactorVlsfoTco2PerTFuel: 3.114,
    co2FactorLngTco2PerTFuel: 2.75,
  },
};

export const tradeRoute: TradeRoute = {
  loadPort: "US_Gulf",
  marketA: { label: "Europe", port: "Rotterdam", benchmark: "TTF" },
  marketB: { label: "Asia", port: "Tokyo", benchmark: "JKM" },
  vesselClass: "TFDE",
  cargoCapacityM3: 174000,
  fuelType: FuelType.VLSFO,
};

export const marketPrices: MarketPrices = {
  priceAUsdMmbtu: 35.69,
  priceBUsdMmbtu: 38.44,
  freightRateUsdDay: 85000,
  fuelPriceUsdT: 583,
  euaPriceUsdT: 74.4,
};

export const decisionConfig: DecisionConfig = {
  rule: {
    basisHaircutPct: 0.05,
    opsBufferUsd: 150000,
    decisionBufferUsd: 250000,
    lotSizeAMmbtu: 10000,
    lotSizeBMmbtu: 10000,
  },
  coveragePct: 0.8,
  stress: {
    spreadShockUsd: 1,
    freightShockUsdDay: 20000,
    euaShockUsd: 10,
  },
};
