import type { Prediction, PricePoint, Stock } from "../types/models";
import { toUnixSeconds } from "../utils/time";

export interface StockView {
  id: number;
  ticker: string;
  name: string;
}

export interface PredictionView {
  /**
   * Position of the prediction in this response, 1..N, newest first. Not the
   * stored id and not stable across requests; do not use it for lookups.
   */
  ID: number;
  /** Same response-local position as `ID`. */
  MessageID: number;
  StockID: number;
  PredictionType: string | null;
  TargetPrice: number | null;
  TargetChangePercent: number | null;
  Period: string | null;
  Recommendation: string | null;
  Direction: string | null;
  JustificationText: string | null;
  Message: string | null;
  /** Seconds since the Unix epoch. */
  PredictedAt: number;
}

export interface PricePointView {
  StockID: number;
  Timestamp: string;
  Price: number;
  Volume: number;
}

export const presentStocks = (stocks: readonly Stock[]): StockView[] =>
  stocks.map(({ id, ticker, name }) => ({ id, ticker, name }));

export const presentPredictions = (predictions: readonly Prediction[]): PredictionView[] =>
  predictions.map((prediction, index) => ({
    ID: index + 1,
    MessageID: index + 1,
    StockID: prediction.stockId,
    PredictionType: prediction.predictionType,
    TargetPrice: prediction.targetPrice,
    TargetChangePercent: prediction.targetChangePercent,
    Period: prediction.period,
    Recommendation: prediction.recommendation,
    Direction: prediction.direction,
    JustificationText: prediction.justificationText,
    Message: prediction.messageText,
    PredictedAt: toUnixSeconds(prediction.predictedAt)
  }));

export const presentHistory = (points: readonly PricePoint[]): PricePointView[] =>
  points.map((point) => ({
    StockID: point.stockId,
    Timestamp: point.timestamp,
    Price: point.price,
    Volume: point.volume
  }));
