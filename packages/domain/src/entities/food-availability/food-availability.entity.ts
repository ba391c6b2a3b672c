/**
 * FoodAvailability Entity
 *
 * Maps a food to a day it is available on. A (food, day) pair identifies
 * one availability slot; storage rejects duplicates.
 */

import { z } from "zod";
import { defineEntity } from "@foodvote/contracts";

export const FoodAvailabilitySchema = z.object({
  id: z.number().int(),
  foodId: z.number().int(),
  dayId: z.number().int(),
});

export const FoodAvailabilityCreateSchema = z.object({
  foodId: z.number().int().positive(),
  dayId: z.number().int().positive(),
});

export const FoodAvailabilityUpdateSchema = FoodAvailabilityCreateSchema.partial();

export type FoodAvailability = z.infer<typeof FoodAvailabilitySchema>;
export type FoodAvailabilityCreate = z.infer<typeof FoodAvailabilityCreateSchema>;
export type FoodAvailabilityUpdate = z.infer<typeof FoodAvailabilityUpdateSchema>;

export const FoodAvailabilityEntity = defineEntity({
  name: "FoodAvailability",
  label: "Food availability",
  pluralName: "food_availabilities",
  description: "Links a food to a day it can be ordered on.",
  createSchema: FoodAvailabilityCreateSchema,
  updateSchema: FoodAvailabilityUpdateSchema,
  readSchema: FoodAvailabilitySchema,
});
