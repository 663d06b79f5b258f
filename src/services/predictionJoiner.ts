import type { StockStore } from "../storage/stockStore";
import type { Prediction, StockId } from "../types/models";

const byPredictedAtDesc = (left: Prediction, right: Prediction): number =>
  right.predictedAt.getTime() - left.predictedAt.getTime();

export class PredictionJoiner {
  constructor(private readonly store: StockStore) {}

  /**
   * Predictions for one stock with their message text, newest first. Equal
   * timestamps keep the order the store returned them in.
   */
  async listPredictions(stockId: StockId): Promise<Prediction[]> {
    const predictions = await this.store.listPredictions(stockId);
    return [...predictions].sort(byPredictedAtDesc);
  }
}
