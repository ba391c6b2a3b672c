/**
 * Entity Definition
 *
 * An Entity is a record type the application manages: User, Food, Day...
 * The definition carries everything the platform needs to expose it:
 *
 *   - URL segment and human-readable label
 *   - Create shape (fields the client supplies, no id)
 *   - Update shape (every field optional, only provided fields applied)
 *   - Read shape (what goes back over the wire, id included)
 *
 * Shapes are Zod schemas. The TypeScript types are inferred from them,
 * so validation and typing can never drift apart.
 */

import type { z } from "zod";

/**
 * Declarative description of one entity.
 *
 * @typeParam TCreate - Parsed create shape
 * @typeParam TUpdate - Parsed update shape (all fields optional)
 * @typeParam TRead - Wire-visible record
 */
export interface EntityDefinition<TCreate, TUpdate, TRead> {
  /** PascalCase entity name. (e.g., "FoodAvailability") */
  name: string;

  /**
   * Human-readable label used in messages.
   * "Food availability" → "Food availability not found"
   */
  label: string;

  /** URL path segment for the route group. (e.g., "food_availabilities") */
  pluralName: string;

  /** Plain English description, for documentation and logs */
  description: string;

  /** Validates a create payload (camelCase keys) */
  createSchema: z.ZodType<TCreate>;

  /** Validates a partial update payload (camelCase keys) */
  updateSchema: z.ZodType<TUpdate>;

  /**
   * Projects a stored record onto its public shape.
   * Unknown keys are stripped, which is how stored-only columns
   * (e.g. a password hash) stay off the wire.
   */
  readSchema: z.ZodType<TRead>;
}

/**
 * Helper function to define an entity with type checking.
 * Use this in domain entity files so the shape types are inferred.
 *
 * @example
 * export const DayEntity = defineEntity({
 *   name: "Day",
 *   label: "Day",
 *   pluralName: "days",
 *   description: "A day of the week foods can be offered on.",
 *   createSchema: DayCreateSchema,
 *   updateSchema: DayUpdateSchema,
 *   readSchema: DaySchema,
 * });
 */
export function defineEntity<TCreate, TUpdate, TRead>(
  definition: EntityDefinition<TCreate, TUpdate, TRead>
): EntityDefinition<TCreate, TUpdate, TRead> {
  return definition;
}
