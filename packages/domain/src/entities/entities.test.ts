/**
 * Domain Entities — Test Suite
 *
 * Validates the create/update/read shapes of every entity and the
 * consistency of the seed data. These tests catch a mistyped field or a
 * missing constraint BEFORE it reaches the database.
 */

import { describe, it, expect } from "vitest";
import { UserEntity, UserSchema, UserCreateSchema } from "./user/user.entity.js";
import { FoodEntity, FoodCreateSchema, FoodUpdateSchema } from "./food/food.entity.js";
import { DayEntity } from "./day/day.entity.js";
import { CategoryEntity } from "./category/category.entity.js";
import { FoodAvailabilityEntity } from "./food-availability/food-availability.entity.js";
import { VoteEntity, VoteCreateSchema, VoteUpdateSchema } from "./vote/vote.entity.js";
import { seedData } from "../index.js";

const allEntities = [
  UserEntity,
  FoodEntity,
  DayEntity,
  CategoryEntity,
  FoodAvailabilityEntity,
  VoteEntity,
];

// ---------------------------------------------------------------------------
// Conventions shared by every entity
// ---------------------------------------------------------------------------

describe("entity definitions", () => {
  it("have unique, URL-safe plural names", () => {
    const plurals = allEntities.map((e) => e.pluralName);
    expect(new Set(plurals).size).toBe(plurals.length);
    for (const plural of plurals) {
      expect(plural).toMatch(/^[a-z][a-z_]*$/);
    }
  });

  it("have a label and a description", () => {
    for (const entity of allEntities) {
      expect(entity.label.length).toBeGreaterThan(0);
      expect(entity.description.length).toBeGreaterThan(0);
    }
  });

  it("accept an empty update (nothing provided)", () => {
    for (const entity of allEntities) {
      expect(entity.updateSchema.safeParse({}).success).toBe(true);
    }
  });

  it("uses the human label for food availability", () => {
    expect(FoodAvailabilityEntity.label).toBe("Food availability");
    expect(FoodAvailabilityEntity.pluralName).toBe("food_availabilities");
  });
});

// ---------------------------------------------------------------------------
// User
// ---------------------------------------------------------------------------

describe("UserEntity", () => {
  it("trims the username on create", () => {
    const parsed = UserCreateSchema.parse({
      username: "  ann ",
      email: "ann@example.com",
      password: "test-password",
    });
    expect(parsed.username).toBe("ann");
  });

  it("rejects an invalid email", () => {
    const result = UserCreateSchema.safeParse({
      username: "ann",
      email: "not-an-email",
      password: "test-password",
    });
    expect(result.success).toBe(false);
  });

  it("rejects a password shorter than 8 characters", () => {
    const result = UserCreateSchema.safeParse({
      username: "ann",
      email: "ann@example.com",
      password: "short",
    });
    expect(result.success).toBe(false);
  });

  it("never exposes the password hash in the read shape", () => {
    const parsed = UserSchema.parse({
      id: 1,
      username: "ann",
      email: "ann@example.com",
      hashedPassword: "hashed:test-password",
    });
    expect(parsed).toEqual({ id: 1, username: "ann", email: "ann@example.com" });
  });
});

// ---------------------------------------------------------------------------
// Food
// ---------------------------------------------------------------------------

describe("FoodEntity", () => {
  it("accepts a free food", () => {
    const result = FoodCreateSchema.safeParse({ name: "Water", price: 0, creatorId: 1 });
    expect(result.success).toBe(true);
  });

  it("rejects a negative price", () => {
    const result = FoodCreateSchema.safeParse({ name: "Soup", price: -1, creatorId: 1 });
    expect(result.success).toBe(false);
  });

  it("requires a creator", () => {
    const result = FoodCreateSchema.safeParse({ name: "Soup", price: 5 });
    expect(result.success).toBe(false);
  });

  it("keeps only the keys that were provided in an update", () => {
    expect(FoodUpdateSchema.parse({ price: 6 })).toEqual({ price: 6 });
  });

  it("allows clearing nullable fields explicitly", () => {
    expect(FoodUpdateSchema.parse({ description: null, dayId: null })).toEqual({
      description: null,
      dayId: null,
    });
  });
});

// ---------------------------------------------------------------------------
// Vote
// ---------------------------------------------------------------------------

describe("VoteEntity", () => {
  it("accepts negative vote values", () => {
    expect(VoteUpdateSchema.parse({ voteValue: -1 })).toEqual({ voteValue: -1 });
  });

  it("rejects fractional vote values", () => {
    const result = VoteCreateSchema.safeParse({ userId: 1, foodId: 1, voteValue: 0.5 });
    expect(result.success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Seed data
// ---------------------------------------------------------------------------

describe("seedData", () => {
  it("references only seeded days and categories", () => {
    const days = new Set(seedData.days.map((d) => d.name));
    const categories = new Set(seedData.categories.map((c) => c.name));
    for (const food of seedData.foods) {
      expect(days.has(food.day)).toBe(true);
      expect(categories.has(food.category)).toBe(true);
    }
  });

  it("passes every seeded user through the create schema", () => {
    for (const user of seedData.users) {
      expect(UserCreateSchema.safeParse(user).success).toBe(true);
    }
  });
});
