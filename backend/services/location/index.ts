// backend/services/location/index.ts
import { SERVICE_NAME } from "./src/bootstrap";
import { config } from "./src/config";
import { initLogger } from "../shared/utils/logger";
import { startHttpService } from "../shared/bootstrap/startHttpService";
import { createDbConnection } from "./src/db";
import { LocationMongoStore } from "./src/repo/mongo/location.mongo.store";
import { createApp } from "./src/app";

const logger = initLogger(SERVICE_NAME);

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "[location] unhandledRejection");
});
process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "[location] uncaughtException");
  process.exit(1);
});

async function main(): Promise<void> {
  const conn = await createDbConnection(config.mongoUri, config.mongoDb);
  const store = new LocationMongoStore(conn, { logger });

  const app = createApp({
    serviceName: SERVICE_NAME,
    store,
    env: config.env,
    corsOrigins: config.corsOrigins,
    bodyLimit: config.bodyLimit,
  });

  startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: () => store.close(),
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "[location] startup failed");
  process.exit(1);
});
