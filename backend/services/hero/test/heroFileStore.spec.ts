// backend/services/hero/test/heroFileStore.spec.ts
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { HeroFileStore } from "../src/repo/heroFileStore";
import { StoreIOError } from "../src/repo/heroStore";
import { HeroController } from "../src/controllers/hero/HeroController";
import { makeTestLogger } from "./helpers/logger";

let dir: string;
let file: string;

async function writeHeroes(value: unknown) {
  await fsp.writeFile(file, JSON.stringify(value), "utf8");
}

async function readHeroes(): Promise<unknown> {
  return JSON.parse(await fsp.readFile(file, "utf8"));
}

beforeEach(async () => {
  dir = await fsp.mkdtemp(path.join(os.tmpdir(), "hero-store-"));
  file = path.join(dir, "heroes.json");
});

afterEach(async () => {
  await fsp.rm(dir, { recursive: true, force: true });
});

describe("HeroFileStore.open", () => {
  it("treats a missing file as an empty store", async () => {
    const store = await HeroFileStore.open(file);
    expect(await store.fetchAll()).toEqual([]);
  });

  it("treats a blank file as an empty store", async () => {
    await fsp.writeFile(file, "  \n", "utf8");
    const store = await HeroFileStore.open(file);
    expect(await store.fetchAll()).toEqual([]);
  });

  it("loads heroes ordered by id", async () => {
    await writeHeroes([
      { id: 12, name: "Tempest" },
      { id: 3, name: "Nightjar" },
    ]);
    const store = await HeroFileStore.open(file);
    expect(await store.fetchAll()).toEqual([
      { id: 3, name: "Nightjar" },
      { id: 12, name: "Tempest" },
    ]);
  });

  it("rejects malformed JSON with StoreIOError", async () => {
    await fsp.writeFile(file, "[{", "utf8");
    await expect(HeroFileStore.open(file)).rejects.toBeInstanceOf(StoreIOError);
  });

  it("rejects records that are not heroes", async () => {
    await writeHeroes([{ id: "one", name: "Max" }]);
    await expect(HeroFileStore.open(file)).rejects.toThrow(
      /^hero store load failed/
    );
  });

  it("rejects an unreadable path", async () => {
    await expect(HeroFileStore.open(dir)).rejects.toBeInstanceOf(StoreIOError);
  });
});

describe("HeroFileStore reads", () => {
  beforeEach(async () => {
    await writeHeroes([
      { id: 1, name: "Max" },
      { id: 2, name: "Maximus" },
      { id: 3, name: "Nightjar" },
    ]);
  });

  it("fetchById returns the hero or null", async () => {
    const store = await HeroFileStore.open(file);
    expect(await store.fetchById(2)).toEqual({ id: 2, name: "Maximus" });
    expect(await store.fetchById(9)).toBeNull();
  });

  it("findByNameSubstring is a case-sensitive contains", async () => {
    const store = await HeroFileStore.open(file);
    expect(await store.findByNameSubstring("Max")).toEqual([
      { id: 1, name: "Max" },
      { id: 2, name: "Maximus" },
    ]);
    expect(await store.findByNameSubstring("max")).toEqual([]);
  });

  it("hands out copies", async () => {
    const store = await HeroFileStore.open(file);
    const hero = await store.fetchById(1);
    if (hero) hero.name = "Changed";
    expect(await store.fetchById(1)).toEqual({ id: 1, name: "Max" });
  });
});

describe("HeroFileStore mutations", () => {
  it("create persists the hero with its id", async () => {
    const store = await HeroFileStore.open(file);
    expect(await store.create({ id: 7, name: "Vesper" })).toEqual({ id: 7, name: "Vesper" });
    expect(await readHeroes()).toEqual([{ id: 7, name: "Vesper" }]);
  });

  it("create refuses a taken id with null", async () => {
    await writeHeroes([{ id: 7, name: "Vesper" }]);
    const store = await HeroFileStore.open(file);
    expect(await store.create({ id: 7, name: "Other" })).toBeNull();
    expect(await store.fetchById(7)).toEqual({ id: 7, name: "Vesper" });
  });

  it("update replaces the name of an existing hero", async () => {
    await writeHeroes([{ id: 7, name: "Vesper" }]);
    const store = await HeroFileStore.open(file);
    expect(await store.update({ id: 7, name: "Vesper II" })).toEqual({ id: 7, name: "Vesper II" });
    expect(await readHeroes()).toEqual([{ id: 7, name: "Vesper II" }]);
  });

  it("update of an unknown id returns null and writes nothing", async () => {
    const store = await HeroFileStore.open(file);
    expect(await store.update({ id: 7, name: "Vesper" })).toBeNull();
    await expect(fsp.access(file)).rejects.toThrow();
  });

  it("deleteById reports whether a hero was removed", async () => {
    await writeHeroes([{ id: 7, name: "Vesper" }]);
    const store = await HeroFileStore.open(file);
    expect(await store.deleteById(7)).toBe(true);
    expect(await store.deleteById(7)).toBe(false);
    expect(await readHeroes()).toEqual([]);
  });

  it("survives a reopen", async () => {
    const first = await HeroFileStore.open(file);
    await first.create({ id: 2, name: "Tempest" });
    await first.create({ id: 1, name: "Max" });
    const second = await HeroFileStore.open(file);
    expect(await second.fetchAll()).toEqual([
      { id: 1, name: "Max" },
      { id: 2, name: "Tempest" },
    ]);
  });

  it("serializes concurrent writers", async () => {
    const store = await HeroFileStore.open(file);
    const ids = [5, 3, 8, 1, 9, 2];
    const results = await Promise.all(
      ids.map((id) => store.create({ id, name: `Hero ${id}` }))
    );
    expect(results.every((r) => r !== null)).toBe(true);
    expect(await readHeroes()).toEqual(
      [1, 2, 3, 5, 8, 9].map((id) => ({ id, name: `Hero ${id}` }))
    );
  });

  it("rejects with StoreIOError and keeps nothing when the write fails", async () => {
    const store = await HeroFileStore.open(file);
    // a directory at the target path makes the final rename fail
    await fsp.mkdir(file);
    await expect(store.create({ id: 7, name: "Vesper" })).rejects.toBeInstanceOf(
      StoreIOError
    );
    expect(await store.fetchById(7)).toBeNull();
    await expect(fsp.access(`${file}.tmp`)).rejects.toThrow();

    // the queue keeps working after a failure
    await fsp.rm(file, { recursive: true });
    expect(await store.create({ id: 8, name: "Nightjar" })).toEqual({ id: 8, name: "Nightjar" });
  });

  it("never shows a write that is still pending, even one that later fails", async () => {
    await writeHeroes([{ id: 1, name: "Max" }]);
    const store = await HeroFileStore.open(file);
    const controller = new HeroController(store, makeTestLogger());
    await fsp.rm(file);
    await fsp.mkdir(file);

    const pending = controller.create({ id: 7, name: "Vesper" });
    await new Promise((resolve) => setImmediate(resolve));

    expect(await controller.get(7)).toEqual({ status: 404 });
    expect(await controller.list()).toEqual({ status: 200, body: [{ id: 1, name: "Max" }] });
    expect(await controller.search("Vesper")).toEqual({ status: 200, body: [] });

    expect(await pending).toEqual({ status: 500 });
    expect(await controller.get(7)).toEqual({ status: 404 });
  });

  it("keeps a failed update or delete invisible", async () => {
    await writeHeroes([{ id: 1, name: "Max" }]);
    const store = await HeroFileStore.open(file);
    await fsp.rm(file);
    await fsp.mkdir(file);

    const update = store.update({ id: 1, name: "Maxine" });
    await new Promise((resolve) => setImmediate(resolve));
    expect(await store.fetchById(1)).toEqual({ id: 1, name: "Max" });
    await expect(update).rejects.toThrow(/^hero store update failed/);

    await expect(store.deleteById(1)).rejects.toThrow(/^hero store deleteById failed/);
    expect(await store.fetchAll()).toEqual([{ id: 1, name: "Max" }]);
  });
});
