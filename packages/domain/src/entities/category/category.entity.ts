/**
 * Category Entity
 */

import { z } from "zod";
import { defineEntity } from "@foodvote/contracts";

export const CategorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

export const CategoryCreateSchema = z.object({
  name: z.string().trim().min(1),
});

export const CategoryUpdateSchema = CategoryCreateSchema.partial();

export type Category = z.infer<typeof CategorySchema>;
export type CategoryCreate = z.infer<typeof CategoryCreateSchema>;
export type CategoryUpdate = z.infer<typeof CategoryUpdateSchema>;

export const CategoryEntity = defineEntity({
  name: "Category",
  label: "Category",
  pluralName: "categories",
  description: "A grouping for foods (soup, main, dessert). Names are unique.",
  createSchema: CategoryCreateSchema,
  updateSchema: CategoryUpdateSchema,
  readSchema: CategorySchema,
});
