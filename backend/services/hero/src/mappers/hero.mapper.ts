// backend/services/hero/src/mappers/hero.mapper.ts
import type { Hero } from "../contracts/hero";
import type { HeroDb } from "../models/Hero";

/**
 * Domain ↔ DB mappers. Keep thin; no business logic here.
 */

export function dbToDomain(doc: HeroDb): Hero {
  return { id: doc.heroId, name: doc.name };
}

export function domainToDb(hero: Hero): HeroDb {
  return { heroId: hero.id, name: hero.name };
}

/** Escape user text for use inside a RegExp literal match. */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
