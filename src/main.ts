import { settings } from "./core/config";
import { describeError } from "./core/errors";
import { logger } from "./core/logger";
import { buildApp } from "./server";
import { buildContainer } from "./services/container";

const main = async (): Promise<void> => {
  const services = buildContainer(settings);
  try {
    await services.stockStore.ping();
  } catch (error) {
    logger.error("Could not connect to the database", describeError(error));
    await services.close();
    process.exit(1);
  }
  logger.info("Connected to the database", {
    host: settings.database.url ? "(DATABASE_URL)" : `${settings.database.host}:${settings.database.port}`,
    historyDataDir: settings.historyDataDir
  });

  const app = await buildApp({ services, corsOrigins: settings.corsOrigins });
  try {
    await app.listen({ host: settings.appHost, port: settings.appPort });
    logger.info(`${settings.appName} listening on http://${settings.appHost}:${settings.appPort}`);
  } catch (error) {
    logger.error("Failed to start server", error);
    await app.close();
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Error during shutdown", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

main().catch((error: unknown) => {
  logger.error("Fatal start-up error", error);
  process.exit(1);
});
