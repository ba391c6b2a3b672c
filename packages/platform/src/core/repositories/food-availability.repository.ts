/**
 * FoodAvailability Repository
 *
 * A second row for the same (food, day) pair violates the table's
 * unique constraint; the resulting storage error is not caught here.
 */
import { eq } from "drizzle-orm";
import type { EntityId, EntityRepository } from "@foodvote/contracts";
import type { FoodAvailability, FoodAvailabilityCreate, FoodAvailabilityUpdate } from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { foodAvailabilities } from "../database/tables.js";
import { isEmptyUpdate, providedFields } from "./partial-update.js";

export class FoodAvailabilityRepository implements EntityRepository<FoodAvailability, FoodAvailabilityCreate, FoodAvailabilityUpdate> {
  constructor(private readonly db: Database) {}

  async get(id: EntityId): Promise<FoodAvailability | null> {
    const rows = await this.db.select().from(foodAvailabilities).where(eq(foodAvailabilities.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async create(data: FoodAvailabilityCreate): Promise<FoodAvailability> {
    const [row] = await this.db
      .insert(foodAvailabilities)
      .values({ foodId: data.foodId, dayId: data.dayId })
      .returning();
    return row;
  }

  async update(id: EntityId, changes: FoodAvailabilityUpdate): Promise<FoodAvailability | null> {
    const set = providedFields(changes);
    if (!isEmptyUpdate(set)) {
      await this.db.update(foodAvailabilities).set(set).where(eq(foodAvailabilities.id, id));
    }
    return this.get(id);
  }

  async delete(id: EntityId): Promise<FoodAvailability | null> {
    const rows = await this.db.delete(foodAvailabilities).where(eq(foodAvailabilities.id, id)).returning();
    return rows[0] ?? null;
  }
}
