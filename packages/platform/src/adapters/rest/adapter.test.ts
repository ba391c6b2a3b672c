/**
 * REST Adapter — Test Suite
 *
 * Drives the entity routes through Fastify's inject() over in-memory
 * repositories. Covers status codes, snake_case bodies, error shapes and
 * session release.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import postgres from "postgres";
import {
  resetObservability,
  setObservabilityProvider,
  type ObservabilityProvider,
} from "../../core/observability/index.js";
import { createInMemoryScopeFactory } from "../../testing/in-memory.js";
import { parseId, registerRESTRoutes, requireStorableId } from "./adapter.js";
import { NotFoundError, RequestValidationError } from "../../core/errors/index.js";

let app: FastifyInstance;
let scope: ReturnType<typeof createInMemoryScopeFactory>;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "debug").mockImplementation(() => {});
  scope = createInMemoryScopeFactory();
  app = Fastify();
  registerRESTRoutes(app, scope.openScope);
  await app.ready();
});

afterEach(async () => {
  await app.close();
  resetObservability();
  vi.restoreAllMocks();
});

async function post(url: string, payload: Record<string, unknown>) {
  return app.inject({ method: "POST", url, payload });
}

async function createUser() {
  return post("/users", {
    username: "ann",
    email: "ann@example.com",
    password: "test-password",
  });
}

async function createFood() {
  await createUser();
  return post("/foods", { name: "Soup", price: 5, creator_id: 1 });
}

// ---------------------------------------------------------------------------
// Happy paths
// ---------------------------------------------------------------------------

describe("entity routes", () => {
  it("creates and reads a food availability with snake_case keys", async () => {
    const day = await post("/days", { name: "Monday" });
    expect(day.statusCode).toBe(201);
    expect(day.json()).toEqual({ id: 1, name: "Monday" });

    const food = await createFood();
    expect(food.json()).toEqual({
      id: 1,
      name: "Soup",
      price: 5,
      description: null,
      creator_id: 1,
      day_id: null,
      category_id: null,
    });

    const created = await post("/food_availabilities", { food_id: 1, day_id: 1 });
    expect(created.statusCode).toBe(201);

    const res = await app.inject({ method: "GET", url: "/food_availabilities/1" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ id: 1, food_id: 1, day_id: 1 });
  });

  it("never returns the password or its hash", async () => {
    const res = await createUser();
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ id: 1, username: "ann", email: "ann@example.com" });
  });

  it("updates only the provided fields of a vote", async () => {
    await createFood();
    await post("/votes", { user_id: 1, food_id: 1, vote_value: 1 });

    const updated = await app.inject({
      method: "PUT",
      url: "/votes/1",
      payload: { vote_value: -1 },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json()).toEqual({ id: 1, user_id: 1, food_id: 1, vote_value: -1 });

    const res = await app.inject({ method: "GET", url: "/votes/1" });
    expect(res.json()).toEqual({ id: 1, user_id: 1, food_id: 1, vote_value: -1 });
  });

  it("returns the deleted record, then 404", async () => {
    await post("/categories", { name: "Soup" });

    const deleted = await app.inject({ method: "DELETE", url: "/categories/1" });
    expect(deleted.statusCode).toBe(200);
    expect(deleted.json()).toEqual({ id: 1, name: "Soup" });

    const res = await app.inject({ method: "GET", url: "/categories/1" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: "Category not found" });
  });
});

// ---------------------------------------------------------------------------
// Not found
// ---------------------------------------------------------------------------

describe("404", () => {
  it("reports a missing user by label", async () => {
    const res = await app.inject({ method: "GET", url: "/users/999" });
    expect(res.statusCode).toBe(404);
    expect(res.body).toBe('{"detail":"User not found"}');
  });

  it("answers zero and negative ids like any other missing id", async () => {
    for (const url of ["/users/0", "/users/-1"]) {
      const res = await app.inject({ method: "GET", url });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ detail: "User not found" });
    }
  });

  it("answers ids beyond the serial range with 404", async () => {
    const get = await app.inject({ method: "GET", url: "/foods/2147483648" });
    expect(get.statusCode).toBe(404);
    expect(get.json()).toEqual({ detail: "Food not found" });

    const del = await app.inject({ method: "DELETE", url: "/votes/99999999999" });
    expect(del.json()).toEqual({ detail: "Vote not found" });

    const put = await app.inject({
      method: "PUT",
      url: "/days/-3",
      payload: { name: "Friday" },
    });
    expect(put.statusCode).toBe(404);
    expect(put.json()).toEqual({ detail: "Day not found" });
  });

  it("uses the human label for food availabilities", async () => {
    const res = await app.inject({ method: "DELETE", url: "/food_availabilities/3" });
    expect(res.json()).toEqual({ detail: "Food availability not found" });
  });

  it("does not create a record when updating a missing one", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/days/4",
      payload: { name: "Friday" },
    });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: "Day not found" });
    await expect(scope.repos.days.get(4)).resolves.toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("422", () => {
  it("rejects a negative price with the wire field name", async () => {
    const res = await post("/foods", { name: "Soup", price: -1, creator_id: 1 });
    expect(res.statusCode).toBe(422);
    const { detail } = res.json<{ detail: Array<{ field: string; code: string }> }>();
    expect(detail).toHaveLength(1);
    expect(detail[0].field).toBe("price");
    expect(detail[0].code).toBe("too_small");
  });

  it("reports missing fields by their snake_case names", async () => {
    const res = await post("/foods", { name: "Soup", price: 5 });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      detail: [{ field: "creator_id", message: "Required", code: "invalid_type" }],
    });
  });

  it("rejects an id that is not an integer", async () => {
    const res = await app.inject({ method: "GET", url: "/days/abc" });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      detail: [{ field: "id", message: "Expected an integer", code: "invalid_string" }],
    });
  });

  it("validates the body before checking the id range", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/votes/-3",
      payload: { vote_value: 0.5 },
    });
    expect(res.statusCode).toBe(422);
  });

  it("never opens a session for an invalid request or an impossible id", async () => {
    await app.inject({ method: "GET", url: "/days/0" });
    await app.inject({ method: "GET", url: "/days/1.5" });
    await post("/votes", { user_id: 1, food_id: 1, vote_value: 0.5 });
    expect(scope.counts.opened).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Server and client errors
// ---------------------------------------------------------------------------

describe("error handling", () => {
  it("answers 500 without leaking the underlying error", async () => {
    const captured: Array<{ message: string; category: unknown }> = [];
    const provider: ObservabilityProvider = {
      name: "test",
      captureException: (error, context) => {
        captured.push({ message: error.message, category: context?.category });
      },
      captureMessage: () => {},
      flush: async () => {},
    };
    setObservabilityProvider(provider);
    vi.spyOn(scope.repos.days, "create").mockRejectedValue(
      new Error('duplicate key value violates unique constraint "days_name_key"')
    );

    const res = await post("/days", { name: "Monday" });
    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('{"detail":"Internal Server Error"}');
    expect(captured).toEqual([
      {
        message: 'duplicate key value violates unique constraint "days_name_key"',
        category: "unhandled",
      },
    ]);
  });

  it("reports database errors under the storage category", async () => {
    const captured: Array<{ message: string; category: unknown }> = [];
    setObservabilityProvider({
      name: "test",
      captureException: (error, context) => {
        captured.push({ message: error.message, category: context?.category });
      },
      captureMessage: () => {},
      flush: async () => {},
    });
    // postgres.js builds its errors from the server's fields
    const violation: Error = Reflect.construct(postgres.PostgresError, [
      {
        message: 'duplicate key value violates unique constraint "food_availabilities_food_id_day_id_key"',
        code: "23505",
      },
    ]);
    vi.spyOn(scope.repos.foodAvailabilities, "create").mockRejectedValue(violation);

    const res = await post("/food_availabilities", { food_id: 1, day_id: 1 });
    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('{"detail":"Internal Server Error"}');
    expect(captured).toEqual([
      {
        message: 'duplicate key value violates unique constraint "food_availabilities_food_id_day_id_key"',
        category: "storage",
      },
    ]);
    expect(scope.counts.released).toBe(scope.counts.opened);
  });

  it("passes client errors through with their own status", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/days",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
    expect(typeof res.json<{ detail: unknown }>().detail).toBe("string");
  });
});

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

describe("sessions", () => {
  it("releases every session it opens, on success and on failure", async () => {
    await post("/days", { name: "Monday" });
    await app.inject({ method: "GET", url: "/days/1" });
    await app.inject({ method: "GET", url: "/days/2" });
    await app.inject({ method: "DELETE", url: "/days/1" });

    expect(scope.counts.opened).toBe(4);
    expect(scope.counts.released).toBe(4);
  });
});

describe("parseId", () => {
  it("accepts any integer", () => {
    expect(parseId("17")).toBe(17);
    expect(parseId("-1")).toBe(-1);
    expect(parseId("2147483648")).toBe(2147483648);
  });

  it("rejects anything that is not an integer", () => {
    expect(() => parseId("1.5")).toThrow(RequestValidationError);
    expect(() => parseId("abc")).toThrow(RequestValidationError);
  });
});

describe("requireStorableId", () => {
  it("passes ids a serial column can hold", () => {
    expect(() => requireStorableId(1, "Day")).not.toThrow();
    expect(() => requireStorableId(2147483647, "Day")).not.toThrow();
  });

  it("throws NotFoundError for the rest", () => {
    expect(() => requireStorableId(0, "Day")).toThrow(NotFoundError);
    expect(() => requireStorableId(-1, "Day")).toThrow("Day with ID -1 not found");
    expect(() => requireStorableId(2147483648, "Day")).toThrow(NotFoundError);
  });
});
