/**
 * Food Entity
 *
 * A dish someone put up for voting. Belongs to its creator and,
 * optionally, to the day it is served and a category.
 */

import { z } from "zod";
import { defineEntity } from "@foodvote/contracts";

const foreignKey = z.number().int().positive();

export const FoodSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  price: z.number(),
  description: z.string().nullable(),
  creatorId: z.number().int(),
  dayId: z.number().int().nullable(),
  categoryId: z.number().int().nullable(),
});

export const FoodCreateSchema = z.object({
  name: z.string().trim().min(1),
  price: z.number().nonnegative(),
  description: z.string().nullable().optional(),
  creatorId: foreignKey,
  dayId: foreignKey.nullable().optional(),
  categoryId: foreignKey.nullable().optional(),
});

export const FoodUpdateSchema = FoodCreateSchema.partial();

export type Food = z.infer<typeof FoodSchema>;
export type FoodCreate = z.infer<typeof FoodCreateSchema>;
export type FoodUpdate = z.infer<typeof FoodUpdateSchema>;

export const FoodEntity = defineEntity({
  name: "Food",
  label: "Food",
  pluralName: "foods",
  description:
    "A dish with a price, created by a user, optionally tied to a day and a category.",
  createSchema: FoodCreateSchema,
  updateSchema: FoodUpdateSchema,
  readSchema: FoodSchema,
});
