// backend/services/hero/src/db.ts
import mongoose from "mongoose";
import type { ILogger } from "../../shared/utils/logger";

export function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}

let connected = false;

export async function connectDb(uri: string, log: ILogger): Promise<void> {
  if (connected) return;

  // Disable buffering so errors surface immediately
  mongoose.set("bufferCommands", false);
  mongoose.set("strictQuery", true);

  log.info({ uri: redactMongoUri(uri) }, "[hero] connecting to Mongo");

  await mongoose.connect(uri).catch((err: unknown) => {
    log.error({ err }, "[hero] mongoose.connect failed");
    throw err;
  });

  if (mongoose.connection.readyState !== 1) {
    await mongoose.connection.asPromise();
  }

  connected = true;
  log.info({}, "[hero] Mongo connected");
}

export async function disconnectDb(): Promise<void> {
  try {
    if (mongoose.connection.readyState !== 0) {
      await mongoose.disconnect();
    }
  } finally {
    connected = false;
  }
}

export function mongoReadiness() {
  const state = mongoose.connection.readyState; // 1 = connected
  return { mongo: state === 1 ? "ok" : `state=${state}` };
}
