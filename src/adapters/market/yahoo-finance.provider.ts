import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { SettingsMap } from '../../config/decision.config';
import { MarketSnapshot, Provenance } from '../../types/domain.types';
import { HttpStatusError, isTransientError, retryWithBackoff, RetryExhaustedError } from '../../utils/retry.util';
import { IMarketDataProvider } from './market-data-provider.interface';
import { buildProxySnapshot } from './proxy-market-data.provider';

// Subset of the chart endpoint response we rely on
const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      meta: z.object({
        symbol: z.string(),
        regularMarketPrice: z.number().optional()
      }),
      indicators: z.object({
        quote: z.array(z.object({
          close: z.array(z.number().nullable()).optional()
        }))
      }).optional()
    })).nullable(),
    error: z.object({
      code: z.string(),
      description: z.string()
    }).nullable().optional()
  })
});

type ChartResponse = z.infer<typeof ChartResponseSchema>;

/**
 * Live A-benchmark and EUA quotes from the Yahoo Finance chart API.
 * B price is the live A price plus the configured premium; freight and fuel
 * stay on proxy values. A field that cannot be fetched falls back to proxy.
 */
@injectable()
export class YahooFinanceMarketDataProvider implements IMarketDataProvider {
  private readonly baseUrl = 'https://query1.finance.yahoo.com/v8/finance/chart';

  constructor(@inject('AppConfig') private config: AppConfig) {}

  async getSnapshot(settings: SettingsMap): Promise<MarketSnapshot> {
    const proxy = buildProxySnapshot(settings);
    const premium = settings.JKM_PREMIUM_USD_PER_MMBTU ?? 0;

    const [priceA, eua] = await Promise.all([
      this.fetchLatestSafely(this.config.marketData.priceASymbol),
      this.fetchLatestSafely(this.config.marketData.euaSymbol)
    ]);

    return {
      ...proxy,
      asof: new Date().toISOString(),
      priceAUsdMmbtu: priceA ?? proxy.priceAUsdMmbtu,
      priceBUsdMmbtu: priceA !== null ? priceA + premium : proxy.priceBUsdMmbtu,
      euaUsdPerTco2: eua ?? proxy.euaUsdPerTco2,
      provenance: {
        ...proxy.provenance,
        priceA: priceA !== null ? Provenance.LIVE : Provenance.PROXY,
        eua: eua !== null ? Provenance.LIVE : Provenance.PROXY
      }
    };
  }

  private async fetchLatestSafely(symbol: string): Promise<number | null> {
    try {
      const response = await retryWithBackoff<ChartResponse>(
        () => this.fetchChart(symbol),
        this.config.retry,
        isTransientError
      );
      const price = this.latestPrice(response);
      if (price === null) {
        console.warn(`[Market Data] No price returned for ${symbol}, using proxy value`);
      }
      return price;
    } catch (error) {
      const reason = error instanceof RetryExhaustedError
        ? `gave up after ${error.attempts} attempts: ${error.lastError.message}`
        : error instanceof Error ? error.message : String(error);
      console.warn(`[Market Data] Live quote for ${symbol} unavailable (${reason}), using proxy value`);
      return null;
    }
  }

  private async fetchChart(symbol: string): Promise<ChartResponse> {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('range', '5d');
    url.searchParams.set('interval', '1d');

    const response = await fetch(url.toString());

    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText);
    }

    const validationResult = ChartResponseSchema.safeParse(await response.json());
    if (!validationResult.success) {
      throw new Error(`Unexpected chart response for ${symbol}`);
    }

    const data = validationResult.data;
    if (data.chart.error) {
      throw new Error(`Quote API error: ${data.chart.error.description}`);
    }

    return data;
  }

  private latestPrice(response: ChartResponse): number | null {
    const result = response.chart.result?.[0];
    if (!result) {
      return null;
    }

    if (result.meta.regularMarketPrice !== undefined) {
      return result.meta.regularMarketPrice;
    }

    const closes = result.indicators?.quote[0]?.close ?? [];
    for (let i = closes.length - 1; i >= 0; i--) {
      const close = closes[i];
      if (close !== null) {
        return close;
      }
    }
    return null;
  }
}
