// backend/services/hero/src/contracts/hero.ts
import { z } from "zod";

/**
 * Hero wire contract: `{ id, name }`.
 * Unknown properties are stripped on parse.
 */
export const zHero = z
  .object({
    id: z.number().int().safe(),
    name: z.string().min(1, "name must not be empty"),
  })
  .strip();

export type Hero = z.infer<typeof zHero>;

export const zHeroList = z.array(zHero);

/** PARAMS: /:id is base-10 integer only ("0x10", "1.5", "7abc" are rejected). */
export const zHeroIdParams = z.object({
  id: z
    .string()
    .regex(/^-?\d+$/, "id must be an integer")
    .transform(Number)
    .pipe(z.number().int().safe()),
});

/** QUERY: `?name=` selects search; absent selects list. */
export const zHeroSearchQuery = z.object({
  name: z.string().optional(),
});
