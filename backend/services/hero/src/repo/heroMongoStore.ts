// backend/services/hero/src/repo/heroMongoStore.ts
import type { Model } from "mongoose";
import HeroModel, { type HeroDb } from "../models/Hero";
import { dbToDomain, domainToDb, escapeRegExp } from "../mappers/hero.mapper";
import type { Hero } from "../contracts/hero";
import { storeCall, type HeroStore } from "./heroStore";

const DUPLICATE_KEY = 11000;

function isDuplicateKey(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === DUPLICATE_KEY
  );
}

/**
 * MongoDB HeroStore. Returns domain objects only (no raw mongoose docs).
 * Uniqueness of `heroId` is enforced by the model's unique index.
 */
export class HeroMongoStore implements HeroStore {
  constructor(private readonly model: Model<HeroDb> = HeroModel) {}

  fetchById(id: number): Promise<Hero | null> {
    return storeCall("fetchById", async () => {
      const doc = await this.model.findOne({ heroId: id }).exec();
      return doc ? dbToDomain(doc) : null;
    });
  }

  fetchAll(): Promise<Hero[]> {
    return storeCall("fetchAll", async () => {
      const docs = await this.model
        .find({})
        .sort({ heroId: 1 })
        .exec();
      return docs.map(dbToDomain);
    });
  }

  findByNameSubstring(text: string): Promise<Hero[]> {
    return storeCall("findByNameSubstring", async () => {
      const docs = await this.model
        .find({ name: { $regex: escapeRegExp(text) } })
        .sort({ heroId: 1 })
        .exec();
      return docs.map(dbToDomain);
    });
  }

  create(hero: Hero): Promise<Hero | null> {
    return storeCall("create", async () => {
      try {
        const doc = await this.model.create(domainToDb(hero));
        return dbToDomain(doc);
      } catch (err) {
        if (isDuplicateKey(err)) return null;
        throw err;
      }
    });
  }

  update(hero: Hero): Promise<Hero | null> {
    return storeCall("update", async () => {
      const doc = await this.model
        .findOneAndUpdate(
          { heroId: hero.id },
          { name: hero.name },
          { new: true, runValidators: true }
        )
        .exec();
      return doc ? dbToDomain(doc) : null;
    });
  }

  deleteById(id: number): Promise<boolean> {
    return storeCall("deleteById", async () => {
      const res = await this.model.deleteOne({ heroId: id }).exec();
      return res.deletedCount > 0;
    });
  }
}
