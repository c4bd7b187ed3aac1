import { inject, injectable } from "tsyringe";
import { IHistoricalSeriesAdapter } from "../adapters/history/history-adapter.interface";
import { IMarketDataProvider } from "../adapters/market/market-data-provider.interface";
import { IReferenceDataAdapter } from "../adapters/reference/reference-data-adapter.interface";
import { parseDecisionConfig } from "../config/decision.config";
import { evaluateHistory, runBacktest } from "../engine/backtester";
import { runStressTest } from "../engine/risk-analyzer";
import { runTradeDecision } from "../engine/trade-decision";
import { MarketPrices } from "../types/domain.types";
import { EmptyInputError } from "../types/error.types";
import { isFailure, isSuccess, unwrapResult } from "../types/result.types";
import {
  BacktestReport,
  BacktestRequest,
  EvaluationReport,
  EvaluationRequest,
  IDiversionAnalyzer,
} from "./diversion-analyzer.interface";

@injectable()
export class DiversionAnalyzerService implements IDiversionAnalyzer {
  constructor(
    @inject("IReferenceDataAdapter")
    private referenceAdapter: IReferenceDataAdapter,
    @inject("IHistoricalSeriesAdapter")
    private historyAdapter: IHistoricalSeriesAdapter,
    @inject("IMarketDataProvider")
    private marketDataProvider: IMarketDataProvider,
  ) {}

  async evaluate(request: EvaluationRequest): Promise<EvaluationReport> {
    const reference = unwrapResult(
      await this.referenceAdapter.getReferenceData(),
      "Reference data",
    );
    const settings = unwrapResult(await this.referenceAdapter.getSettings(), "Settings");
    const config = parseDecisionConfig(settings, request.overrides);

    const snapshot = await this.marketDataProvider.getSnapshot(settings);
    const prices: MarketPrices = {
      priceAUsdMmbtu: snapshot.priceAUsdMmbtu,
      priceBUsdMmbtu: snapshot.priceBUsdMmbtu,
      freightRateUsdDay: snapshot.freightUsdDay,
      fuelPriceUsdT: snapshot.fuelUsdPerT,
      euaPriceUsdT: snapshot.euaUsdPerTco2,
    };

    const tradePack = runTradeDecision(reference, {
      route: request.route,
      prices,
      config,
    });
    const riskPack = runStressTest(
      tradePack.decision,
      reference,
      request.route,
      prices,
      config,
    );

    console.log(
      `[Diversion] ${request.route.marketA.benchmark} ${prices.priceAUsdMmbtu} vs ${request.route.marketB.benchmark} ${prices.priceBUsdMmbtu}: ${tradePack.decision.decision}`,
    );

    return { snapshot, tradePack, riskPack };
  }

  async backtest(request: BacktestRequest): Promise<BacktestReport> {
    const reference = unwrapResult(
      await this.referenceAdapter.getReferenceData(),
      "Reference data",
    );
    const settings = unwrapResult(await this.referenceAdapter.getSettings(), "Settings");
    const config = parseDecisionConfig(settings, request.overrides);

    const seriesResult = await this.historyAdapter.getSeries(request.from, request.to);
    if (!isSuccess(seriesResult)) {
      throw isFailure(seriesResult)
        ? new Error(seriesResult.message)
        : new EmptyInputError(seriesResult.message);
    }

    const series = seriesResult.data;
    console.log(
      `[Backtest] Running decision engine over ${series.length} day(s): ${series[0].date} to ${series[series.length - 1].date}`,
    );

    const dailyDecisions = evaluateHistory(reference, request.route, series, config);
    const result = runBacktest(dailyDecisions);

    return { route: request.route, config, result };
  }
}
