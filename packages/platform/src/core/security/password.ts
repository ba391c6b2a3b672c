/**
 * Password Hashing
 *
 * bcrypt via bcryptjs (pure JavaScript, no native build).
 * Passwords are hashed on write and never returned; verification is
 * not part of this API.
 */

import bcrypt from "bcryptjs";
import type { PasswordHasher } from "@foodvote/contracts";

const DEFAULT_ROUNDS = 10;

export function createBcryptHasher(rounds: number = DEFAULT_ROUNDS): PasswordHasher {
  return {
    async hash(plain) {
      const salt = await bcrypt.genSalt(rounds);
      return bcrypt.hash(plain, salt);
    },
  };
}
