// backend/services/location/src/config.ts

/**
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Fail fast at import time if something required is missing/invalid.
 */

import { listEnv, optionalEnv, requireEnv, requireNumber } from "../../shared/config/env";

export const config = {
  // pass-through (optional)
  env: optionalEnv("NODE_ENV"),

  // required
  port: requireNumber("LOCATION_PORT"),
  mongoUri: requireEnv("LOCATION_MONGO_URI"),
  logLevel: requireEnv("LOG_LEVEL"),

  // optional
  mongoDb: optionalEnv("LOCATION_MONGO_DB"),
  corsOrigins: listEnv("LOCATION_CORS_ORIGINS"),
  bodyLimit: optionalEnv("LOCATION_BODY_LIMIT"),
} as const;
