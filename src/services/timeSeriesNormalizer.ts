import type { PricePoint, RawBar, StockId } from "../types/models";
import { toIsoSeconds } from "../utils/time";

export class TimeSeriesNormalizer {
  /**
   * Oldest bar first. Bars sharing an instant stay in input order and are all
   * kept.
   */
  normalize(stockId: StockId, bars: readonly RawBar[]): PricePoint[] {
    return [...bars]
      .sort((left, right) => left.openedAtMs - right.openedAtMs)
      .map((bar) => ({
        stockId,
        timestamp: toIsoSeconds(bar.openedAtMs),
        price: bar.price,
        volume: bar.volume
      }));
  }
}
