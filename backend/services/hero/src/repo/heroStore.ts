// backend/services/hero/src/repo/heroStore.ts
import type { Hero } from "../contracts/hero";

/**
 * Persistence port for Hero records.
 * Every method rejects with StoreIOError on a persistence failure; "no match"
 * is expressed as null/false/[] and never as an error.
 */
export interface HeroStore {
  fetchById(id: number): Promise<Hero | null>;
  fetchAll(): Promise<Hero[]>;
  findByNameSubstring(text: string): Promise<Hero[]>;
  /** Returns null when the store refuses the record. */
  create(hero: Hero): Promise<Hero | null>;
  /** Returns null when no record has `hero.id`. */
  update(hero: Hero): Promise<Hero | null>;
  deleteById(id: number): Promise<boolean>;
}

export class StoreIOError extends Error {
  readonly op: string;

  constructor(op: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`hero store ${op} failed: ${reason}`, { cause });
    this.name = "StoreIOError";
    this.op = op;
  }
}

/** Runs a persistence call, wrapping anything it throws in StoreIOError. */
export async function storeCall<T>(op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StoreIOError) throw err;
    throw new StoreIOError(op, err);
  }
}
