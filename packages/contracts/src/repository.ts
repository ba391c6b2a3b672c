/**
 * Repository Contract
 *
 * The single-record data access surface every entity store implements.
 * Absence is a value here (null), never an error: only the service
 * layer decides that a missing record is a failure.
 */

/** Storage-assigned identifier. All entities use integer keys. */
export type EntityId = number;

export interface EntityRepository<TRecord, TCreate, TUpdate> {
  /** Returns the record, or null when no record has this id */
  get(id: EntityId): Promise<TRecord | null>;

  /** Inserts a new record and returns it with its assigned id */
  create(data: TCreate): Promise<TRecord>;

  /**
   * Applies only the provided fields of `changes`, then re-reads the record.
   * Returns null when no record has this id.
   */
  update(id: EntityId, changes: TUpdate): Promise<TRecord | null>;

  /** Removes the record and returns it as it was, or null if it never existed */
  delete(id: EntityId): Promise<TRecord | null>;
}
