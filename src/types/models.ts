export type StockId = number;

export interface Stock {
  id: StockId;
  ticker: string;
  name: string;
}

export interface Prediction {
  /** Durable storage id. Never replaced by the display sequence number. */
  id: number;
  stockId: StockId;
  messageRef: string | null;
  predictionType: string | null;
  targetPrice: number | null;
  targetChangePercent: number | null;
  period: string | null;
  recommendation: string | null;
  direction: string | null;
  justificationText: string | null;
  messageText: string | null;
  predictedAt: Date;
}

/** One bar that survived parsing, before ordering and timestamp encoding. */
export interface RawBar {
  lineNumber: number;
  openedAtMs: number;
  price: number;
  volume: number;
}

export type DropReason =
  | "too_few_fields"
  | "invalid_timestamp"
  | "invalid_price"
  | "negative_price";

export interface DroppedRecord {
  lineNumber: number;
  reason: DropReason;
}

export type RecordOutcome =
  | { status: "kept"; bar: RawBar; volumeDefaulted: boolean }
  | { status: "dropped"; record: DroppedRecord };

export interface ParseReport {
  ticker: string;
  totalRecords: number;
  headerSkipped: boolean;
  bars: RawBar[];
  dropped: DroppedRecord[];
  volumeDefaulted: number;
}

export interface PricePoint {
  stockId: StockId;
  /** RFC 3339 UTC with whole seconds, e.g. `2025-09-15T00:00:00Z`. */
  timestamp: string;
  price: number;
  volume: number;
}
