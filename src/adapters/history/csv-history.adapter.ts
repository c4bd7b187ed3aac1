import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { MarketObservation } from '../../types/domain.types';
import { Result } from '../../types/result.types';
import { IHistoricalSeriesAdapter } from './history-adapter.interface';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD');

// Benchmark sheet: market A and B gas prices per day
const BenchmarkRowSchema = z.object({
  date: isoDate,
  TTF_USD_MMBTU: z.number(),
  JKM_USD_MMBTU: z.number()
});

// Auxiliary sheet: freight, bunker fuel and carbon per day
const AuxRowSchema = z.object({
  date: isoDate,
  FREIGHT_USD_DAY: z.number(),
  FUEL_USD_PER_T: z.number(),
  EUA_USD_PER_TCO2: z.number()
});

type BenchmarkRow = z.infer<typeof BenchmarkRowSchema>;
type AuxRow = z.infer<typeof AuxRowSchema>;

@injectable()
export class CsvHistoryAdapter implements IHistoricalSeriesAdapter {
  private seriesCache: MarketObservation[] | null = null;

  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async getSeries(from?: string, to?: string): Promise<Result<MarketObservation[]>> {
    const loadResult = await this.ensureCacheLoaded();
    if (!loadResult.success) {
      return {
        success: false,
        message: loadResult.message
      };
    }

    const series = (this.seriesCache ?? []).filter(
      row => (from === undefined || row.date >= from) && (to === undefined || row.date <= to)
    );

    if (series.length === 0) {
      return {
        success: true,
        message: `No historical observations found between ${from ?? 'start'} and ${to ?? 'end'}`
      };
    }

    return {
      success: true,
      data: series,
      message: `${series.length} historical observation(s) from ${series[0].date} to ${series[series.length - 1].date}`
    };
  }

  private async ensureCacheLoaded(): Promise<Result<void>> {
    if (this.seriesCache !== null) {
      return { success: true, message: 'Cache already loaded' };
    }

    try {
      const benchmarks = this.validateRows(
        await this.readRows(this.config.data.benchmarkPricesPath),
        BenchmarkRowSchema,
        'benchmark'
      );
      const aux = new Map<string, AuxRow>();
      for (const row of this.validateRows(await this.readRows(this.config.data.auxSeriesPath), AuxRowSchema, 'aux')) {
        aux.set(row.date, row);
      }

      // Inner join on date
      this.seriesCache = benchmarks
        .filter(b => aux.has(b.date))
        .map(b => this.mapToObservation(b, aux))
        .sort((a, b) => a.date.localeCompare(b.date));

      const dropped = benchmarks.length - this.seriesCache.length;
      if (dropped > 0) {
        console.warn(`[History] ${dropped} benchmark day(s) without auxiliary data dropped`);
      }

      return { success: true, message: 'Historical series loaded successfully' };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to load historical series: ${errorMessage}`
      };
    }
  }

  private mapToObservation(benchmark: BenchmarkRow, aux: Map<string, AuxRow>): MarketObservation {
    const auxRow = aux.get(benchmark.date);
    if (!auxRow) {
      throw new Error(`No auxiliary data for ${benchmark.date}`);
    }
    return {
      date: benchmark.date,
      priceAUsdMmbtu: benchmark.TTF_USD_MMBTU,
      priceBUsdMmbtu: benchmark.JKM_USD_MMBTU,
      freightUsdDay: auxRow.FREIGHT_USD_DAY,
      fuelUsdPerT: auxRow.FUEL_USD_PER_T,
      euaUsdPerTco2: auxRow.EUA_USD_PER_TCO2
    };
  }

  private async readRows(filePath: string): Promise<unknown[]> {
    const content = await readFile(filePath, 'utf-8');
    const rows: unknown[] = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      cast: true
    });
    return rows;
  }

  private validateRows<T>(rows: unknown[], schema: z.ZodType<T>, sheet: string): T[] {
    const valid: T[] = [];
    for (const row of rows) {
      const validationResult = schema.safeParse(row);
      if (validationResult.success) {
        valid.push(validationResult.data);
      } else {
        const errors = validationResult.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        console.warn(`[History] Skipping invalid ${sheet} row: ${errors}`);
      }
    }
    return valid;
  }
}
