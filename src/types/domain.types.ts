// Domain types - clean models isolated from file and provider formats

export enum FuelType {
  VLSFO = 'VLSFO',
  LNG = 'LNG'
}

export enum Decision {
  DIVERT = 'DIVERT',
  KEEP = 'KEEP'
}

export enum HedgeSide {
  BUY = 'BUY',
  SELL = 'SELL'
}

export interface Route {
  loadPort: string;
  dischargePort: string;
  distanceNm: number;
}

export interface Vessel {
  vesselClass: string;
  cargoCapacityM3: number;
  ladenSpeedKn: number;
  ballastSpeedKn: number;
  boilOffPctPerDay: number;          // percent of cargo per day, e.g. 0.10
  fuelConsumptionTpdLaden: number;   // tonnes per day
  fuelConsumptionTpdBallast: number; // tonnes per day
}

export interface CarbonParams {
  euaPriceUsdPerT: number;
  co2FactorVlsfoTco2PerTFuel: number;
  co2FactorLngTco2PerTFuel: number;
}

/**
 * Static reference tables. Read-only and safe to share across evaluations.
 */
export interface ReferenceData {
  readonly routes: readonly Route[];
  readonly vessels: readonly Vessel[];
  readonly carbonParams: CarbonParams;
}

export interface VoyageRates {
  freightRateUsdDay: number;
  fuelPriceUsdT: number;
  euaPriceUsdT: number;
}

export interface VoyageDetails {
  readonly distanceNm: number;
  readonly voyageDays: number;
  readonly boilOffM3: number;
  readonly deliveredCargoM3: number;
  readonly deliveredEnergyMmbtu: number;
  readonly fuelConsumedTonnes: number;
  readonly fuelCostUsd: number;
  readonly timeCharterCostUsd: number;
  readonly carbonCostUsd: number;
  readonly totalVoyageCostUsd: number;
}

export interface NetbackResult {
  readonly destination: string;
  readonly priceUsdMmbtu: number;
  readonly deliveredEnergyMmbtu: number;
  readonly revenueUsd: number;
  readonly voyageCostUsd: number;   // excludes carbon
  readonly carbonCostUsd: number;
  readonly netbackUsd: number;
  readonly voyage: VoyageDetails;
}

/**
 * One side of the diversion comparison: where the cargo discharges and
 * which paper benchmark prices it.
 */
export interface MarketLeg {
  label: string;      // e.g. "Europe"
  port: string;       // discharge port, e.g. "Rotterdam"
  benchmark: string;  // hedge instrument, e.g. "TTF"
}

export interface TradeRoute {
  loadPort: string;
  marketA: MarketLeg;
  marketB: MarketLeg;  // candidate divert-to market
  vesselClass: string;
  cargoCapacityM3: number;
  fuelType: FuelType;
}

export interface MarketPrices {
  priceAUsdMmbtu: number;
  priceBUsdMmbtu: number;
  freightRateUsdDay: number;
  fuelPriceUsdT: number;
  euaPriceUsdT: number;
}

export interface HedgeLeg {
  readonly side: HedgeSide;
  readonly instrument: string;
  readonly lots: number;
}

export interface HedgeInstruments {
  a: string;
  b: string;
}

export interface DecisionRule {
  basisHaircutPct: number;   // fraction in [0, 1]
  opsBufferUsd: number;
  decisionBufferUsd: number;
  lotSizeAMmbtu: number;
  lotSizeBMmbtu: number;
}

export interface StressMagnitudes {
  spreadShockUsd: number;
  freightShockUsdDay: number;
  euaShockUsd: number;
}

export interface DecisionConfig {
  rule: DecisionRule;
  coveragePct: number;       // fraction in [0, 1]
  stress: StressMagnitudes;
}

export interface DecisionResult {
  readonly deltaNetbackRawUsd: number;
  readonly deltaNetbackAdjUsd: number;
  readonly basisHaircutPct: number;
  readonly opsBufferUsd: number;
  readonly decisionBufferUsd: number;
  readonly decision: Decision;
  readonly hedgeEnergyMmbtu: number;
  readonly lotsA: number;
  readonly lotsB: number;
  readonly hedgeLegs: readonly HedgeLeg[];
}

export interface NetbackSummary {
  readonly label: string;
  readonly port: string;
  readonly benchmark: string;
  readonly priceUsdMmbtu: number;
  readonly netbackUsd: number;
  readonly revenueUsd: number;
  readonly voyageCostUsd: number;
  readonly carbonCostUsd: number;
  readonly deliveredEnergyMmbtu: number;
  readonly voyageDays: number;
}

export interface TradeDecisionRequest {
  route: TradeRoute;
  prices: MarketPrices;
  config: DecisionConfig;
}

export interface TradePack {
  readonly inputs: {
    readonly route: TradeRoute;
    readonly prices: MarketPrices;
    readonly rule: DecisionRule;
    readonly coveragePct: number;
  };
  readonly marketA: NetbackSummary;
  readonly marketB: NetbackSummary;
  readonly decision: DecisionResult;
  readonly hedgeLegs: readonly HedgeLeg[];
}

export enum Provenance {
  PROXY = 'proxy',
  LIVE = 'live'
}

export type MarketField = 'priceA' | 'priceB' | 'freight' | 'fuel' | 'eua';

export interface MarketSnapshot {
  asof: string;
  priceAUsdMmbtu: number;
  priceBUsdMmbtu: number;
  freightUsdDay: number;
  fuelUsdPerT: number;
  euaUsdPerTco2: number;
  provenance: Record<MarketField, Provenance>;
}

/**
 * One row of the historical series, keyed by ISO date (YYYY-MM-DD).
 */
export interface MarketObservation {
  date: string;
  priceAUsdMmbtu: number;
  priceBUsdMmbtu: number;
  freightUsdDay: number;
  fuelUsdPerT: number;
  euaUsdPerTco2: number;
}
