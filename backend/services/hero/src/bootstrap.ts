// backend/services/hero/src/bootstrap.ts
/**
 * Side-effect module imported first by index.ts: loads the env file and tags
 * the process with the service name before the shared logger is created.
 */
import { loadEnvFile, assertRequiredEnv } from "../../shared/config/env";
import { SERVICE_NAME } from "./config";

const envFile = process.env.ENV_FILE?.trim() || ".env";
const loaded = loadEnvFile(envFile);

process.env.SERVICE_NAME ??= SERVICE_NAME;

assertRequiredEnv(["LOG_LEVEL", "HERO_PORT"]);

console.log(
  loaded
    ? `[bootstrap] Loaded env from: ${loaded}`
    : `[bootstrap] No env file at ${envFile}; using process env`
);
