import { settings } from "../core/config";
import type { AppSettings } from "../core/config";
import { PgStockStore, createPool } from "../storage/stockStore";
import type { StockStore } from "../storage/stockStore";
import { AggregationService } from "./aggregationService";

export interface ServiceContainer {
  stockStore: StockStore;
  aggregation: AggregationService;
  close: () => Promise<void>;
}

export const assembleContainer = (
  stockStore: StockStore,
  historyDataDir: string,
  close: () => Promise<void> = async () => undefined
): ServiceContainer => ({
  stockStore,
  aggregation: AggregationService.create(stockStore, historyDataDir),
  close
});

export const buildContainer = (config: AppSettings = settings): ServiceContainer => {
  const pool = createPool(config.database);
  return assembleContainer(new PgStockStore(pool), config.historyDataDir, () => pool.end());
};
