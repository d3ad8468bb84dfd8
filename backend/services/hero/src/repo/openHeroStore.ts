// backend/services/hero/src/repo/openHeroStore.ts
import type { ReadinessFn } from "../../../shared/health";
import type { ILogger } from "../../../shared/utils/logger";
import type { HeroConfig } from "../config";
import { connectDb, disconnectDb, mongoReadiness } from "../db";
import { HeroFileStore } from "./heroFileStore";
import { HeroMongoStore } from "./heroMongoStore";
import type { HeroStore } from "./heroStore";

export type OpenedStore = {
  store: HeroStore;
  readiness: ReadinessFn;
  close: () => Promise<void>;
};

/** Opens the store selected by HERO_STORE. */
export async function openHeroStore(
  config: HeroConfig,
  log: ILogger
): Promise<OpenedStore> {
  if (config.store === "mongo" && config.mongoUri) {
    await connectDb(config.mongoUri, log);
    return {
      store: new HeroMongoStore(),
      readiness: mongoReadiness,
      close: disconnectDb,
    };
  }

  const store = await HeroFileStore.open(config.dataFile);
  log.info({ file: store.filePath }, "[hero] file store opened");
  return {
    store,
    readiness: async () => ({
      store: "file",
      heroes: (await store.fetchAll()).length,
    }),
    close: async () => undefined,
  };
}
