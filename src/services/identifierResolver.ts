import { NotFoundError } from "../core/errors";
import type { StockStore } from "../storage/stockStore";
import type { StockId } from "../types/models";

export class IdentifierResolver {
  constructor(private readonly store: StockStore) {}

  /** Exact, case-sensitive ticker match. The ticker is used as given. */
  async resolve(ticker: string): Promise<StockId> {
    const stockId = await this.store.findStockIdByTicker(ticker);
    if (stockId === null) {
      throw new NotFoundError(`stock not found for ticker ${ticker}`, "stock", {
        operation: "resolveTicker",
        ticker
      });
    }
    return stockId;
  }
}
