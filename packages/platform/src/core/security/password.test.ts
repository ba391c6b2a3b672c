import { describe, it, expect } from "vitest";
import bcrypt from "bcryptjs";
import { createBcryptHasher } from "./password.js";

describe("createBcryptHasher", () => {
  // Minimum cost keeps the suite fast; production uses the default.
  const hasher = createBcryptHasher(4);

  it("produces a bcrypt hash that verifies against the plain password", async () => {
    const hash = await hasher.hash("test-password");
    expect(hash).toMatch(/^\$2[aby]\$04\$/);
    expect(await bcrypt.compare("test-password", hash)).toBe(true);
    expect(await bcrypt.compare("other-password", hash)).toBe(false);
  });

  it("salts every hash", async () => {
    const first = await hasher.hash("test-password");
    const second = await hasher.hash("test-password");
    expect(first).not.toBe(second);
  });
});
