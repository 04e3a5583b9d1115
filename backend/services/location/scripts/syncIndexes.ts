// backend/services/location/scripts/syncIndexes.ts
/**
 * One-shot schema setup: connects with the service env and syncs every
 * declared index (including the partial unique index on active city codes).
 *
 *   ENV_FILE=.env.dev npm run sync-indexes
 */
import "../src/bootstrap";
import { config } from "../src/config";
import { createDbConnection } from "../src/db";
import { LocationMongoStore } from "../src/repo/mongo/location.mongo.store";
import { initLogger } from "../../shared/utils/logger";

const logger = initLogger("location-sync-indexes");

async function run(): Promise<void> {
  const conn = await createDbConnection(config.mongoUri, config.mongoDb);
  const store = new LocationMongoStore(conn, { logger });
  try {
    await store.ensureIndexes();
    logger.info("[location.syncIndexes] indexes in sync");
  } finally {
    await store.close();
  }
}

run().catch((err: unknown) => {
  logger.error({ err }, "[location.syncIndexes] failed");
  process.exit(1);
});
