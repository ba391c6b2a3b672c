/**
 * @foodvote/contracts
 *
 * Public API — the shared boundary between platform and domain.
 * Both sides import from this package.
 */

// Entity definitions
export type { EntityDefinition } from "./entity.js";
export { defineEntity } from "./entity.js";

// Repositories
export type { EntityRepository, EntityId } from "./repository.js";

// Runtime context
export type { Logger, PasswordHasher } from "./context.js";
