/**
 * Entity Service
 *
 * Turns repository absence into NotFoundError and logs every operation.
 * Each entity gets one instance per request, bound to that request's
 * repositories.
 *
 * Lifecycle of a record: Absent -> Exists only through create,
 * Exists -> Absent only through delete. Any other operation on an absent
 * record fails before touching storage.
 */

import type { EntityId, EntityRepository, Logger } from "@foodvote/contracts";
import { NotFoundError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";

/** The four operations the REST adapter calls on any entity */
export interface EntityOperations<TRecord, TCreate, TUpdate> {
  get(id: EntityId): Promise<TRecord>;
  create(data: TCreate): Promise<TRecord>;
  update(id: EntityId, changes: TUpdate): Promise<TRecord>;
  delete(id: EntityId): Promise<TRecord>;
}

export class EntityService<TRecord extends { id: EntityId }, TCreate, TUpdate>
  implements EntityOperations<TRecord, TCreate, TUpdate>
{
  protected readonly logger: Logger;

  constructor(
    /** Human-readable label used in NotFound messages ("Food availability") */
    protected readonly label: string,
    protected readonly repository: EntityRepository<TRecord, TCreate, TUpdate>,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger(`service:${label}`);
  }

  async get(id: EntityId): Promise<TRecord> {
    const record = await this.repository.get(id);
    if (!record) {
      this.logger.debug("Record not found", { id });
      throw new NotFoundError(this.label, id);
    }
    return record;
  }

  async create(data: TCreate): Promise<TRecord> {
    const record = await this.repository.create(data);
    this.logger.info("Record created", { id: record.id });
    return record;
  }

  async update(id: EntityId, changes: TUpdate): Promise<TRecord> {
    await this.get(id);
    const record = await this.repository.update(id, changes);
    if (!record) {
      // Deleted by another request between the check and the write
      throw new NotFoundError(this.label, id);
    }
    this.logger.info("Record updated", { id });
    return record;
  }

  async delete(id: EntityId): Promise<TRecord> {
    await this.get(id);
    const record = await this.repository.delete(id);
    if (!record) {
      throw new NotFoundError(this.label, id);
    }
    this.logger.info("Record deleted", { id });
    return record;
  }
}
