/**
 * Request Scope
 *
 * Everything one request works with: a reserved storage session and the
 * services built over it. The caller owns the scope and must release it
 * on every exit path.
 */

import type { PasswordHasher } from "@foodvote/contracts";
import type { DatabaseHandle } from "../database/connection.js";
import { createRepositories } from "../repositories/index.js";
import { createServices, type Services } from "./create-services.js";

export interface RequestScope {
  services: Services;
  release(): void;
}

export type ScopeFactory = () => Promise<RequestScope>;

/**
 * Returns a factory that opens a fresh session per call.
 */
export function createScopeFactory(
  database: Pick<DatabaseHandle, "openSession">,
  hasher: PasswordHasher
): ScopeFactory {
  return async () => {
    const session = await database.openSession();
    return {
      services: createServices(createRepositories(session.db, hasher)),
      release: () => session.release(),
    };
  };
}

/**
 * Runs `work` inside a fresh scope and releases it afterwards, whether
 * `work` resolves or throws.
 */
export async function withScope<T>(
  openScope: ScopeFactory,
  work: (services: Services) => Promise<T>
): Promise<T> {
  const scope = await openScope();
  try {
    return await work(scope.services);
  } finally {
    scope.release();
  }
}
