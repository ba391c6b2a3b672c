/**
 * Partial Update
 *
 * Update shapes have every field optional. A field counts as provided
 * when its key is present with a defined value; an explicit null is a
 * provided value (it clears a nullable column). Everything else is left
 * untouched by the update.
 */

/**
 * Returns only the provided fields of an update shape.
 */
export function providedFields<T extends object>(changes: T): Partial<T> {
  const provided: Partial<T> = {};
  for (const key in changes) {
    if (Object.prototype.hasOwnProperty.call(changes, key) && changes[key] !== undefined) {
      provided[key] = changes[key];
    }
  }
  return provided;
}

/** True when the update would not change anything */
export function isEmptyUpdate(changes: object): boolean {
  return Object.keys(providedFields(changes)).length === 0;
}
