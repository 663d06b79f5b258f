import { createLogger } from "../core/logger";
import type { StockStore } from "../storage/stockStore";
import type { DropReason, ParseReport, Prediction, PricePoint, Stock } from "../types/models";
import { IdentifierResolver } from "./identifierResolver";
import { PredictionJoiner } from "./predictionJoiner";
import { TimeSeriesNormalizer } from "./timeSeriesNormalizer";
import { TimeSeriesParser } from "./timeSeriesParser";

const log = createLogger("aggregation");

const countByReason = (report: ParseReport): Partial<Record<DropReason, number>> => {
  const counts: Partial<Record<DropReason, number>> = {};
  for (const entry of report.dropped) {
    counts[entry.reason] = (counts[entry.reason] ?? 0) + 1;
  }
  return counts;
};

export interface AggregationDeps {
  resolver: IdentifierResolver;
  predictions: PredictionJoiner;
  parser: TimeSeriesParser;
  normalizer: TimeSeriesNormalizer;
}

/**
 * Entry point for the three read operations. Holds no request state: every
 * call resolves the ticker again and builds its result from scratch.
 */
export class AggregationService {
  constructor(
    private readonly store: StockStore,
    private readonly deps: AggregationDeps
  ) {}

  static create(store: StockStore, historyDataDir: string): AggregationService {
    return new AggregationService(store, {
      resolver: new IdentifierResolver(store),
      predictions: new PredictionJoiner(store),
      parser: new TimeSeriesParser(historyDataDir),
      normalizer: new TimeSeriesNormalizer()
    });
  }

  async listStocks(): Promise<Stock[]> {
    return this.store.listStocks();
  }

  async getPredictions(ticker: string): Promise<Prediction[]> {
    const stockId = await this.deps.resolver.resolve(ticker);
    return this.deps.predictions.listPredictions(stockId);
  }

  async getHistory(ticker: string): Promise<PricePoint[]> {
    const stockId = await this.deps.resolver.resolve(ticker);
    const report = await this.deps.parser.parse(ticker);

    const summary = {
      ticker,
      totalRecords: report.totalRecords,
      kept: report.bars.length,
      dropped: countByReason(report),
      volumeDefaulted: report.volumeDefaulted
    };
    if (report.dropped.length > 0) {
      log.warn(`Dropped ${report.dropped.length} malformed history records`, summary);
    } else {
      log.debug("Parsed price history", summary);
    }

    return this.deps.normalizer.normalize(stockId, report.bars);
  }
}
