/**
 * Vote Entity
 *
 * A user's vote on a food. The value is a signed integer;
 * the API does not constrain its range.
 */

import { z } from "zod";
import { defineEntity } from "@foodvote/contracts";

export const VoteSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  foodId: z.number().int(),
  voteValue: z.number().int(),
});

export const VoteCreateSchema = z.object({
  userId: z.number().int().positive(),
  foodId: z.number().int().positive(),
  voteValue: z.number().int(),
});

export const VoteUpdateSchema = VoteCreateSchema.partial();

export type Vote = z.infer<typeof VoteSchema>;
export type VoteCreate = z.infer<typeof VoteCreateSchema>;
export type VoteUpdate = z.infer<typeof VoteUpdateSchema>;

export const VoteEntity = defineEntity({
  name: "Vote",
  label: "Vote",
  pluralName: "votes",
  description: "A user's integer vote on a food.",
  createSchema: VoteCreateSchema,
  updateSchema: VoteUpdateSchema,
  readSchema: VoteSchema,
});
