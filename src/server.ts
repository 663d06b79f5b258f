import Fastify from "fastify";
import type { FastifyRequest } from "fastify";
import cors from "@fastify/cors";

import { registerRoutes } from "./api/routes";
import { settings } from "./core/config";
import { createLogger } from "./core/logger";
import { buildContainer } from "./services/container";
import type { ServiceContainer } from "./services/container";

declare module "fastify" {
  interface FastifyInstance {
    services: ServiceContainer;
  }
  interface FastifyRequest {
    startedMs?: number;
  }
}

const log = createLogger("http");

const requestReasonByRoute: Record<string, string> = {
  "/health": "Health check",
  "/stocks": "List stocks",
  "/predictions/:ticker": "Fetch predictions for ticker",
  "/stocks/:ticker/history": "Fetch price history for ticker"
};

const routeOf = (request: FastifyRequest): string =>
  request.routeOptions.url ?? request.url.split("?")[0] ?? request.url;

export interface BuildAppOptions {
  services?: ServiceContainer;
  corsOrigins?: string[];
}

export const buildApp = async (options: BuildAppOptions = {}) => {
  const app = Fastify({ logger: false });
  app.decorate("services", options.services ?? buildContainer());
  app.decorateRequest("startedMs", undefined);

  await app.register(cors, {
    origin: options.corsOrigins ?? settings.corsOrigins,
    methods: ["GET", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true
  });

  app.addHook("onRequest", async (request) => {
    request.startedMs = Date.now();
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = routeOf(request);
    const reason = requestReasonByRoute[route] ?? `Handle ${request.method} ${route}`;
    const durationMs = request.startedMs === undefined ? 0 : Date.now() - request.startedMs;
    const line = `${request.method} ${request.url} -> ${reply.statusCode} (${durationMs}ms)`;
    const meta = { reason, route, params: request.params, requestId: request.id };
    if (reply.statusCode >= 500) log.warn(line, meta);
    else log.info(line, meta);
  });

  await registerRoutes(app);

  app.addHook("onClose", async () => {
    await app.services.close();
  });

  return app;
};
