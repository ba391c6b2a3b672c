import type { Logger } from "@foodvote/contracts";
import type { UserCreate, UserRecord, UserUpdate } from "@foodvote/domain";
import { UserEntity } from "@foodvote/domain";
import { NotFoundError } from "../errors/index.js";
import type { UserStore } from "../repositories/index.js";
import { EntityService } from "./entity-service.js";

export class UserService extends EntityService<UserRecord, UserCreate, UserUpdate> {
  constructor(
    private readonly users: UserStore,
    logger?: Logger
  ) {
    super(UserEntity.label, users, logger);
  }

  /** Looks a user up by email */
  async getByEmail(email: string): Promise<UserRecord> {
    const record = await this.users.getByEmail(email);
    if (!record) {
      throw new NotFoundError(this.label, email, "email");
    }
    return record;
  }
}
