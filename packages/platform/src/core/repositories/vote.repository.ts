import { eq } from "drizzle-orm";
import type { EntityId, EntityRepository } from "@foodvote/contracts";
import type { Vote, VoteCreate, VoteUpdate } from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { votes } from "../database/tables.js";
import { isEmptyUpdate, providedFields } from "./partial-update.js";

export class VoteRepository implements EntityRepository<Vote, VoteCreate, VoteUpdate> {
  constructor(private readonly db: Database) {}

  async get(id: EntityId): Promise<Vote | null> {
    const rows = await this.db.select().from(votes).where(eq(votes.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async create(data: VoteCreate): Promise<Vote> {
    const [row] = await this.db
      .insert(votes)
      .values({
        userId: data.userId,
        foodId: data.foodId,
        voteValue: data.voteValue,
      })
      .returning();
    return row;
  }

  async update(id: EntityId, changes: VoteUpdate): Promise<Vote | null> {
    const set = providedFields(changes);
    if (!isEmptyUpdate(set)) {
      await this.db.update(votes).set(set).where(eq(votes.id, id));
    }
    return this.get(id);
  }

  async delete(id: EntityId): Promise<Vote | null> {
    const rows = await this.db.delete(votes).where(eq(votes.id, id)).returning();
    return rows[0] ?? null;
  }
}
