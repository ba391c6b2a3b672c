/**
 * Food Repository
 *
 * Optional references (day, category) and the description are stored as
 * NULL when omitted on create.
 */
import { eq } from "drizzle-orm";
import type { EntityId, EntityRepository } from "@foodvote/contracts";
import type { Food, FoodCreate, FoodUpdate } from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { foods } from "../database/tables.js";
import { isEmptyUpdate, providedFields } from "./partial-update.js";

export class FoodRepository implements EntityRepository<Food, FoodCreate, FoodUpdate> {
  constructor(private readonly db: Database) {}

  async get(id: EntityId): Promise<Food | null> {
    const rows = await this.db.select().from(foods).where(eq(foods.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async create(data: FoodCreate): Promise<Food> {
    const [row] = await this.db
      .insert(foods)
      .values({
        name: data.name,
        price: data.price,
        description: data.description ?? null,
        creatorId: data.creatorId,
        dayId: data.dayId ?? null,
        categoryId: data.categoryId ?? null,
      })
      .returning();
    return row;
  }

  async update(id: EntityId, changes: FoodUpdate): Promise<Food | null> {
    const set = providedFields(changes);
    if (!isEmptyUpdate(set)) {
      await this.db.update(foods).set(set).where(eq(foods.id, id));
    }
    return this.get(id);
  }

  async delete(id: EntityId): Promise<Food | null> {
    const rows = await this.db.delete(foods).where(eq(foods.id, id)).returning();
    return rows[0] ?? null;
  }
}
