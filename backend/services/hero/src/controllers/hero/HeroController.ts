// backend/services/hero/src/controllers/hero/HeroController.ts
/**
 * Purpose:
 * - Request-level logic for the Hero resource: one store call per operation,
 *   outcome mapped to an HTTP status plus optional body.
 *
 * Notes:
 * - Stateless: holds only the injected store and logger.
 * - StoreIOError is caught at every operation and answered with 500. Any
 *   other error is not a store failure and is rethrown to the HTTP layer.
 * - Not-found and conflict are outcomes, never errors.
 */

import type { ILogger } from "../../../../shared/utils/logger";
import type { Hero } from "../../contracts/hero";
import { StoreIOError, type HeroStore } from "../../repo/heroStore";

export type HandlerResult<T> = { status: number; body?: T };

/**
 * Conflict rule used by create: the new name contains an existing name, or
 * the ids are equal. Direction matters: a new "Maximus" clashes with an
 * existing "Max", a new "Max" does not clash with an existing "Maximus".
 */
export function conflictsWith(candidate: Hero, existing: Hero): boolean {
  return candidate.name.includes(existing.name) || candidate.id === existing.id;
}

export class HeroController {
  constructor(
    private readonly store: HeroStore,
    private readonly log: ILogger
  ) {}

  async get(id: number): Promise<HandlerResult<Hero>> {
    this.log.info({ op: "get", id }, `GET /heroes/${id}`);
    try {
      const hero = await this.store.fetchById(id);
      if (hero) return { status: 200, body: hero };
      return { status: 404 };
    } catch (err) {
      return this.storeFailure("get", err);
    }
  }

  async list(apiVersion?: string): Promise<HandlerResult<Hero[]>> {
    this.log.info(
      { op: "list", apiVersion: apiVersion ?? "unspecified" },
      "GET /heroes"
    );
    try {
      const heroes = await this.store.fetchAll();
      return { status: 200, body: heroes };
    } catch (err) {
      return this.storeFailure("list", err);
    }
  }

  async search(name: string): Promise<HandlerResult<Hero[]>> {
    this.log.info({ op: "search", name }, `GET /heroes/?name=${name}`);
    try {
      const heroes = await this.store.findByNameSubstring(name);
      return { status: 200, body: heroes };
    } catch (err) {
      return this.storeFailure("search", err);
    }
  }

  async create(hero: Hero): Promise<HandlerResult<Hero>> {
    this.log.info({ op: "create", hero }, "POST /heroes");
    try {
      const existing = await this.store.fetchAll();
      const clash = existing.find((e) => conflictsWith(hero, e));
      if (clash) {
        this.log.debug({ op: "create", hero, clash }, "create conflict");
        return { status: 409 };
      }

      const created = await this.store.create(hero);
      if (created) return { status: 201, body: created };

      this.log.warn({ op: "create", hero }, "store returned no hero");
      return { status: 500 };
    } catch (err) {
      return this.storeFailure("create", err);
    }
  }

  /** Answers with the submitted hero, not the store's copy. */
  async update(hero: Hero): Promise<HandlerResult<Hero>> {
    this.log.info({ op: "update", hero }, "PUT /heroes");
    try {
      const updated = await this.store.update(hero);
      if (updated) return { status: 200, body: hero };
      return { status: 404 };
    } catch (err) {
      return this.storeFailure("update", err);
    }
  }

  async delete(id: number): Promise<HandlerResult<never>> {
    this.log.info({ op: "delete", id }, `DELETE /heroes/${id}`);
    try {
      const deleted = await this.store.deleteById(id);
      return { status: deleted ? 200 : 404 };
    } catch (err) {
      return this.storeFailure("delete", err);
    }
  }

  private storeFailure(op: string, err: unknown): HandlerResult<never> {
    if (!(err instanceof StoreIOError)) throw err;
    this.log.error({ op, err }, "hero store failure");
    return { status: 500 };
  }
}
