// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

/**
 * Load an env file into process.env (variables already set win).
 * Returns the resolved path when a file was loaded, null when none exists.
 * Throws if the file exists but cannot be parsed.
 */
export function loadEnvFile(envFilePath: string): string | null {
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) return null;

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${resolved}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return resolved;
}

/** Assert required environment variables are present (non-empty). */
export function assertRequiredEnv(
  keys: string[],
  env: NodeJS.ProcessEnv = process.env
) {
  const missing = keys.filter((k) => !env[k] || env[k]?.trim() === "");
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}
