import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { describeError, isAggregationError } from "../core/errors";
import type { FailureKind } from "../core/errors";
import { createLogger } from "../core/logger";
import { tickerParamsSchema } from "../types/schemas";
import { presentHistory, presentPredictions, presentStocks } from "./views";

const log = createLogger("api");

const statusByKind: Record<FailureKind, number> = {
  not_found: 404,
  source_unavailable: 503
};

const sendFailure = (reply: FastifyReply, error: unknown, operation: string) => {
  if (isAggregationError(error)) {
    const statusCode = statusByKind[error.kind];
    const details = { ...error.context, kind: error.kind, cause: error.cause };
    if (error.kind === "not_found") log.info(`${operation}: ${error.message}`, details);
    else log.error(`${operation} failed: ${error.message}`, details);
    return reply.code(statusCode).send({ error: error.message, kind: error.kind });
  }

  log.error(`${operation} failed unexpectedly`, error);
  return reply.code(500).send({ error: describeError(error), kind: "internal" });
};

export const registerRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      await app.services.stockStore.ping();
      return { status: "ok", database: "up" };
    } catch (error) {
      log.warn("Health check could not reach the database", describeError(error));
      return reply.code(503).send({ status: "degraded", database: "down" });
    }
  });

  app.get("/stocks", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const stocks = await app.services.aggregation.listStocks();
      log.debug(`Returning ${stocks.length} stocks`);
      return presentStocks(stocks);
    } catch (error) {
      return sendFailure(reply, error, "listStocks");
    }
  });

  app.get("/predictions/:ticker", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = tickerParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }
    const { ticker } = params.data;

    try {
      const predictions = await app.services.aggregation.getPredictions(ticker);
      log.debug(`Found ${predictions.length} predictions for ticker '${ticker}'`);
      return presentPredictions(predictions);
    } catch (error) {
      return sendFailure(reply, error, "getPredictions");
    }
  });

  app.get("/stocks/:ticker/history", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = tickerParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }
    const { ticker } = params.data;

    try {
      const history = await app.services.aggregation.getHistory(ticker);
      log.debug(`Found ${history.length} price points for ticker '${ticker}'`);
      return presentHistory(history);
    } catch (error) {
      return sendFailure(reply, error, "getHistory");
    }
  });
};
