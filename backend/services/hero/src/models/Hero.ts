// backend/services/hero/src/models/Hero.ts
import { Schema, model } from "mongoose";

/** Stored shape; `heroId` carries the domain id (Mongo keeps its own _id). */
export interface HeroDb {
  heroId: number;
  name: string;
}

const HeroSchema = new Schema<HeroDb>(
  {
    heroId: {
      type: Number,
      required: true,
      unique: true,
      index: true,
      validate: {
        validator: (v: number) => Number.isInteger(v),
        message: "heroId must be an integer",
      },
    },
    name: { type: String, required: true, minlength: 1 },
  },
  { strict: true, versionKey: false }
);

const HeroModel = model<HeroDb>("Hero", HeroSchema);
export default HeroModel;
