// backend/services/hero/test/helpers/logger.ts
import { vi } from "vitest";
import type { ILogger } from "../../../shared/utils/logger";

export function makeTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ILogger;
}
