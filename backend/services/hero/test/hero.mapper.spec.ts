// backend/services/hero/test/hero.mapper.spec.ts
import { describe, it, expect } from "vitest";
import { dbToDomain, domainToDb, escapeRegExp } from "../src/mappers/hero.mapper";

describe("hero.mapper", () => {
  it("maps heroId to id and back", () => {
    expect(dbToDomain({ heroId: 7, name: "Vesper" })).toEqual({ id: 7, name: "Vesper" });
    expect(domainToDb({ id: 7, name: "Vesper" })).toEqual({ heroId: 7, name: "Vesper" });
  });

  it("escapes regex metacharacters", () => {
    expect(escapeRegExp("a.b*c")).toBe("a\\.b\\*c");
    expect(escapeRegExp("(x)[y]")).toBe("\\(x\\)\\[y\\]");
  });

  it("escaped text matches only itself", () => {
    const re = new RegExp(escapeRegExp("Dr. X"));
    expect(re.test("Dr. X")).toBe(true);
    expect(re.test("Dra X")).toBe(false);
  });
});
