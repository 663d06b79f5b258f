import { Pool } from "pg";
import type { PoolConfig } from "pg";
import type { ZodType, ZodTypeDef } from "zod";

import type { DatabaseSettings } from "../core/config";
import { SourceUnavailableError, describeError } from "../core/errors";
import type { FailureContext } from "../core/errors";
import { createLogger } from "../core/logger";
import type { Prediction, Stock, StockId } from "../types/models";
import { predictionRowSchema, stockIdRowSchema, stockRowSchema } from "../types/schemas";
import type { PredictionRow } from "../types/schemas";

const log = createLogger("db");

/** Read access to the relational side: stocks, predictions and their messages. */
export interface StockStore {
  listStocks(): Promise<Stock[]>;
  findStockIdByTicker(ticker: string): Promise<StockId | null>;
  /** Newest first; predictions without a matching message keep `messageText: null`. */
  listPredictions(stockId: StockId): Promise<Prediction[]>;
  ping(): Promise<void>;
}

/** The slice of `pg.Pool` the store uses; rows are validated before use. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const LIST_STOCKS_SQL = "SELECT id, ticker, name FROM stocks ORDER BY id";

const FIND_STOCK_ID_SQL = "SELECT id FROM stocks WHERE ticker = $1 LIMIT 1";

const LIST_PREDICTIONS_SQL = `
  SELECT
    p.id, p.stock_id, p.message_id, p.prediction_type,
    p.target_price, p.target_change_percent, p.period,
    p.recommendation, p.direction, p.justification_text,
    m.text AS message_text, p.predicted_at
  FROM predictions p
  LEFT JOIN messages m ON m.telegram_id = p.message_id
  WHERE p.stock_id = $1
  ORDER BY p.predicted_at DESC, p.id ASC
`;

const toPrediction = (row: PredictionRow): Prediction => ({
  id: row.id,
  stockId: row.stock_id,
  messageRef: row.message_id,
  predictionType: row.prediction_type,
  targetPrice: row.target_price,
  targetChangePercent: row.target_change_percent,
  period: row.period,
  recommendation: row.recommendation,
  direction: row.direction,
  justificationText: row.justification_text,
  messageText: row.message_text,
  predictedAt: row.predicted_at
});

export class PgStockStore implements StockStore {
  constructor(private readonly client: SqlClient) {}

  private async select(
    sql: string,
    values: unknown[],
    context: FailureContext
  ): Promise<unknown[]> {
    try {
      const result = await this.client.query(sql, values);
      return result.rows;
    } catch (error) {
      throw new SourceUnavailableError(
        `Query for ${context.operation} failed: ${describeError(error)}`,
        context,
        error
      );
    }
  }

  private decodeRows<T>(
    rows: unknown[],
    schema: ZodType<T, ZodTypeDef, unknown>,
    context: FailureContext
  ): T[] {
    return rows.map((row, index) => {
      const parsed = schema.safeParse(row);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
        throw new SourceUnavailableError(
          `Unexpected row shape for ${context.operation} (row ${index}, ${where})`,
          context,
          parsed.error
        );
      }
      return parsed.data;
    });
  }

  async listStocks(): Promise<Stock[]> {
    const context: FailureContext = { operation: "listStocks" };
    const rows = await this.select(LIST_STOCKS_SQL, [], context);
    return this.decodeRows(rows, stockRowSchema, context);
  }

  async findStockIdByTicker(ticker: string): Promise<StockId | null> {
    const context: FailureContext = { operation: "resolveTicker", ticker };
    const rows = await this.select(FIND_STOCK_ID_SQL, [ticker], context);
    const [first] = this.decodeRows(rows, stockIdRowSchema, context);
    return first ? first.id : null;
  }

  async listPredictions(stockId: StockId): Promise<Prediction[]> {
    const context: FailureContext = { operation: "listPredictions", stockId };
    const rows = await this.select(LIST_PREDICTIONS_SQL, [stockId], context);
    return this.decodeRows(rows, predictionRowSchema, context).map(toPrediction);
  }

  async ping(): Promise<void> {
    await this.select("SELECT 1", [], { operation: "ping" });
  }
}

export const buildPoolConfig = (db: DatabaseSettings): PoolConfig => {
  const ssl =
    db.sslMode === "disable"
      ? false
      : { rejectUnauthorized: db.sslMode === "verify-full" };
  const shared: PoolConfig = {
    ssl,
    max: db.poolMax,
    connectionTimeoutMillis: db.connectionTimeoutMs,
    statement_timeout: db.statementTimeoutMs,
    query_timeout: db.statementTimeoutMs
  };
  if (db.url) return { ...shared, connectionString: db.url };
  return {
    ...shared,
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.name
  };
};

export const createPool = (db: DatabaseSettings): Pool => {
  const pool = new Pool(buildPoolConfig(db));
  pool.on("error", (error) => {
    log.error("Idle PostgreSQL client error", error);
  });
  return pool;
};
