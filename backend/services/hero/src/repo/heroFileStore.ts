// backend/services/hero/src/repo/heroFileStore.ts
import fsp from "node:fs/promises";
import path from "node:path";
import { zHeroList, type Hero } from "../contracts/hero";
import { StoreIOError, type HeroStore } from "./heroStore";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

const byId = (a: Hero, b: Hero) => a.id - b.id;
const copy = (h: Hero): Hero => ({ id: h.id, name: h.name });
const sorted = (heroes: Map<number, Hero>) => [...heroes.values()].sort(byId).map(copy);

/**
 * JSON-file HeroStore.
 *
 * - The whole collection lives in memory and is rewritten to disk after
 *   every mutation (write to `<file>.tmp`, then rename).
 * - Mutations run one at a time through `queue`. Each builds the next map,
 *   writes it, and only then replaces `heroes`; reads see committed state only.
 * - A failed write leaves `heroes` as it was and rejects with StoreIOError.
 */
export class HeroFileStore implements HeroStore {
  private heroes = new Map<number, Hero>();
  private queue: Promise<void> = Promise.resolve();

  private constructor(readonly filePath: string) {}

  /** Opens the store; a missing file is an empty store. */
  static async open(filePath: string): Promise<HeroFileStore> {
    const store = new HeroFileStore(path.resolve(filePath));
    await store.load();
    return store;
  }

  async fetchById(id: number): Promise<Hero | null> {
    const hero = this.heroes.get(id);
    return hero ? copy(hero) : null;
  }

  async fetchAll(): Promise<Hero[]> {
    return sorted(this.heroes);
  }

  async findByNameSubstring(text: string): Promise<Hero[]> {
    return sorted(this.heroes).filter((h) => h.name.includes(text));
  }

  create(hero: Hero): Promise<Hero | null> {
    return this.serialize(async () => {
      if (this.heroes.has(hero.id)) return null;
      const next = new Map(this.heroes).set(hero.id, copy(hero));
      await this.commit("create", next);
      return copy(hero);
    });
  }

  update(hero: Hero): Promise<Hero | null> {
    return this.serialize(async () => {
      if (!this.heroes.has(hero.id)) return null;
      const next = new Map(this.heroes).set(hero.id, copy(hero));
      await this.commit("update", next);
      return copy(hero);
    });
  }

  deleteById(id: number): Promise<boolean> {
    return this.serialize(async () => {
      if (!this.heroes.has(id)) return false;
      const next = new Map(this.heroes);
      next.delete(id);
      await this.commit("deleteById", next);
      return true;
    });
  }

  // ── internals ───────────────────────────────────────────────────────────────

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return;
      throw new StoreIOError("load", err);
    }
    if (!raw.trim()) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StoreIOError("load", err);
    }

    const result = zHeroList.safeParse(parsed);
    if (!result.success) throw new StoreIOError("load", result.error);
    for (const hero of result.data) this.heroes.set(hero.id, hero);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // the chain only orders writes; callers observe failures through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async commit(op: string, next: Map<number, Hero>): Promise<void> {
    try {
      await this.save(sorted(next));
    } catch (err) {
      throw new StoreIOError(op, err);
    }
    this.heroes = next;
  }

  private async save(heroes: Hero[]): Promise<void> {
    const body = JSON.stringify(heroes, null, 2) + "\n";
    const tmp = `${this.filePath}.tmp`;
    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fsp.writeFile(tmp, body, "utf8");
      await fsp.rename(tmp, this.filePath);
    } catch (err) {
      await fsp.rm(tmp, { force: true });
      throw err;
    }
  }
}
