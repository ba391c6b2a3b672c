/**
 * User Repository
 *
 * Stores users with a bcrypt hash in place of the plain password.
 * The plain password is hashed here, on both create and update, so it
 * never reaches a query.
 */

import { eq } from "drizzle-orm";
import type { EntityId, EntityRepository, PasswordHasher } from "@foodvote/contracts";
import type { UserCreate, UserRecord, UserUpdate } from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { users } from "../database/tables.js";
import { isEmptyUpdate, providedFields } from "./partial-update.js";

type UserColumns = Partial<typeof users.$inferInsert>;

export class UserRepository implements EntityRepository<UserRecord, UserCreate, UserUpdate> {
  constructor(
    private readonly db: Database,
    private readonly hasher: PasswordHasher
  ) {}

  async get(id: EntityId): Promise<UserRecord | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getByEmail(email: string): Promise<UserRecord | null> {
    const rows = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return rows[0] ?? null;
  }

  async create(data: UserCreate): Promise<UserRecord> {
    const hashedPassword = await this.hasher.hash(data.password);
    const [row] = await this.db
      .insert(users)
      .values({ username: data.username, email: data.email, hashedPassword })
      .returning();
    return row;
  }

  async update(id: EntityId, changes: UserUpdate): Promise<UserRecord | null> {
    const { password, ...rest } = changes;
    const set: UserColumns = providedFields(rest);
    if (password !== undefined) {
      set.hashedPassword = await this.hasher.hash(password);
    }
    if (!isEmptyUpdate(set)) {
      await this.db.update(users).set(set).where(eq(users.id, id));
    }
    return this.get(id);
  }

  async delete(id: EntityId): Promise<UserRecord | null> {
    const rows = await this.db.delete(users).where(eq(users.id, id)).returning();
    return rows[0] ?? null;
  }
}
