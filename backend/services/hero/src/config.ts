// backend/services/hero/src/config.ts
import path from "node:path";
import { isLogLevel } from "../../shared/utils/logLevel";

/**
 * Config is read from an env record (process.env at runtime) and validated
 * all at once; every problem is reported in a single error.
 */
export const SERVICE_NAME = "hero" as const;

export type StoreKind = "file" | "mongo";

export type HeroConfig = {
  readonly port: number;
  readonly store: StoreKind;
  readonly dataFile: string;
  readonly mongoUri?: string;
};

const DEFAULT_DATA_FILE = "data/heroes.json";

export function loadConfig(env: NodeJS.ProcessEnv): HeroConfig {
  const problems: string[] = [];
  const read = (name: string) => env[name]?.trim() || undefined;

  const rawPort = read("HERO_PORT");
  const port = Number(rawPort);
  if (rawPort === undefined) {
    problems.push("Missing required env var: HERO_PORT");
  } else if (!Number.isInteger(port) || port < 0 || port > 65535) {
    problems.push(`Invalid port for HERO_PORT: "${rawPort}"`);
  }

  const logLevel = read("LOG_LEVEL");
  if (logLevel === undefined) {
    problems.push("Missing required env var: LOG_LEVEL");
  } else if (!isLogLevel(logLevel)) {
    problems.push(`Invalid LOG_LEVEL: "${logLevel}"`);
  }

  const rawStore = read("HERO_STORE") ?? "file";
  let store: StoreKind = "file";
  if (rawStore === "file" || rawStore === "mongo") {
    store = rawStore;
  } else {
    problems.push(`Invalid HERO_STORE: "${rawStore}" (expected file|mongo)`);
  }

  const mongoUri = read("HERO_MONGO_URI");
  if (store === "mongo" && mongoUri === undefined) {
    problems.push("Missing required env var: HERO_MONGO_URI");
  }

  if (problems.length) throw new Error(problems.join("; "));

  return Object.freeze({
    port,
    store,
    dataFile: path.resolve(read("HERO_DATA_FILE") ?? DEFAULT_DATA_FILE),
    mongoUri,
  });
}
