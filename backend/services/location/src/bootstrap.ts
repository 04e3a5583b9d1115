// backend/services/location/src/bootstrap.ts
/**
 * Load the service env file and assert the minimum required variables.
 * Must be imported before config.ts or anything that reads process.env.
 */

import {
  assertRequiredEnv,
  loadEnvFromFileOrThrow,
} from "../../shared/config/env";

export const SERVICE_NAME = "location" as const;

process.env.SERVICE_NAME = process.env.SERVICE_NAME || SERVICE_NAME;

loadEnvFromFileOrThrow(process.env.ENV_FILE || ".env.dev");

assertRequiredEnv(["LOG_LEVEL", "LOCATION_MONGO_URI", "LOCATION_PORT"]);
