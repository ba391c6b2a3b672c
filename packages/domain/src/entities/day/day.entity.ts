/**
 * Day Entity
 *
 * A named day foods can be offered on. Names are unique.
 */

import { z } from "zod";
import { defineEntity } from "@foodvote/contracts";

export const DaySchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

export const DayCreateSchema = z.object({
  name: z.string().trim().min(1),
});

export const DayUpdateSchema = DayCreateSchema.partial();

export type Day = z.infer<typeof DaySchema>;
export type DayCreate = z.infer<typeof DayCreateSchema>;
export type DayUpdate = z.infer<typeof DayUpdateSchema>;

export const DayEntity = defineEntity({
  name: "Day",
  label: "Day",
  pluralName: "days",
  description: "A day of the week foods can be offered on.",
  createSchema: DayCreateSchema,
  updateSchema: DayUpdateSchema,
  readSchema: DaySchema,
});
