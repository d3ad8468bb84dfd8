// backend/services/shared/utils/logLevel.ts
import type { LevelWithSilent } from "pino";

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}
