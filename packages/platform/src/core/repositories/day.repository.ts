/**
 * Day Repository
 *
 * Single-record data access for the days table.
 * Absence is returned as null; storage errors propagate unchanged.
 */
import { eq } from "drizzle-orm";
import type { EntityId, EntityRepository } from "@foodvote/contracts";
import type { Day, DayCreate, DayUpdate } from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { days } from "../database/tables.js";
import { isEmptyUpdate, providedFields } from "./partial-update.js";

export class DayRepository implements EntityRepository<Day, DayCreate, DayUpdate> {
  constructor(private readonly db: Database) {}

  async get(id: EntityId): Promise<Day | null> {
    const rows = await this.db.select().from(days).where(eq(days.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async create(data: DayCreate): Promise<Day> {
    const [row] = await this.db
      .insert(days)
      .values({ name: data.name })
      .returning();
    return row;
  }

  async update(id: EntityId, changes: DayUpdate): Promise<Day | null> {
    const set = providedFields(changes);
    if (!isEmptyUpdate(set)) {
      await this.db.update(days).set(set).where(eq(days.id, id));
    }
    return this.get(id);
  }

  async delete(id: EntityId): Promise<Day | null> {
    const rows = await this.db.delete(days).where(eq(days.id, id)).returning();
    return rows[0] ?? null;
  }
}
