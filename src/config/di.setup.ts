import 'reflect-metadata';
import { container } from 'tsyringe';
import { CsvHistoryAdapter } from '../adapters/history/csv-history.adapter';
import { IHistoricalSeriesAdapter } from '../adapters/history/history-adapter.interface';
import { IMarketDataProvider } from '../adapters/market/market-data-provider.interface';
import { ProxyMarketDataProvider } from '../adapters/market/proxy-market-data.provider';
import { YahooFinanceMarketDataProvider } from '../adapters/market/yahoo-finance.provider';
import { CsvReferenceDataAdapter } from '../adapters/reference/csv-reference-data.adapter';
import { IReferenceDataAdapter } from '../adapters/reference/reference-data-adapter.interface';
import { IDiversionAnalyzer } from '../services/diversion-analyzer.interface';
import { DiversionAnalyzerService } from '../services/diversion-analyzer.service';
import { IReportWriter } from '../services/report-writer.interface';
import { ReportWriterService } from '../services/report-writer.service';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('AppConfig', { useValue: config });

  // Register adapters (singletons keep their loaded CSV caches)
  container.registerSingleton<IReferenceDataAdapter>('IReferenceDataAdapter', CsvReferenceDataAdapter);
  container.registerSingleton<IHistoricalSeriesAdapter>('IHistoricalSeriesAdapter', CsvHistoryAdapter);

  if (config.marketData.source === 'yahoo') {
    container.register<IMarketDataProvider>('IMarketDataProvider', {
      useClass: YahooFinanceMarketDataProvider
    });
  } else {
    container.register<IMarketDataProvider>('IMarketDataProvider', {
      useClass: ProxyMarketDataProvider
    });
  }

  // Register services
  container.register<IReportWriter>('IReportWriter', {
    useClass: ReportWriterService
  });

  container.register<IDiversionAnalyzer>('IDiversionAnalyzer', {
    useClass: DiversionAnalyzerService
  });
}
