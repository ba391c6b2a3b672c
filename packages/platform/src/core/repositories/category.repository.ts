/**
 * Category Repository
 */
import { eq } from "drizzle-orm";
import type { EntityId, EntityRepository } from "@foodvote/contracts";
import type { Category, CategoryCreate, CategoryUpdate } from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { categories } from "../database/tables.js";
import { isEmptyUpdate, providedFields } from "./partial-update.js";

export class CategoryRepository implements EntityRepository<Category, CategoryCreate, CategoryUpdate> {
  constructor(private readonly db: Database) {}

  async get(id: EntityId): Promise<Category | null> {
    const rows = await this.db.select().from(categories).where(eq(categories.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async create(data: CategoryCreate): Promise<Category> {
    const [row] = await this.db
      .insert(categories)
      .values({ name: data.name })
      .returning();
    return row;
  }

  async update(id: EntityId, changes: CategoryUpdate): Promise<Category | null> {
    const set = providedFields(changes);
    if (!isEmptyUpdate(set)) {
      await this.db.update(categories).set(set).where(eq(categories.id, id));
    }
    return this.get(id);
  }

  async delete(id: EntityId): Promise<Category | null> {
    const rows = await this.db.delete(categories).where(eq(categories.id, id)).returning();
    return rows[0] ?? null;
  }
}
