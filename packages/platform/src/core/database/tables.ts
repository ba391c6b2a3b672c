/**
 * Table Declarations
 *
 * Drizzle table objects for every entity. Repositories build their
 * queries from these; the DDL that creates them lives in migrate.ts.
 *
 * Columns are snake_case in the database and camelCase in TypeScript,
 * matching the record types in @foodvote/domain.
 */

import {
  pgTable,
  serial,
  text,
  integer,
  doublePrecision,
  unique,
} from "drizzle-orm/pg-core";

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: text("username").notNull().unique(),
  email: text("email").notNull().unique(),
  hashedPassword: text("hashed_password").notNull(),
});

export const days = pgTable("days", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
});

export const categories = pgTable("categories", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
});

export const foods = pgTable("foods", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  price: doublePrecision("price").notNull(),
  description: text("description"),
  creatorId: integer("creator_id")
    .notNull()
    .references(() => users.id),
  dayId: integer("day_id").references(() => days.id),
  categoryId: integer("category_id").references(() => categories.id),
});

export const foodAvailabilities = pgTable(
  "food_availabilities",
  {
    id: serial("id").primaryKey(),
    foodId: integer("food_id")
      .notNull()
      .references(() => foods.id),
    dayId: integer("day_id")
      .notNull()
      .references(() => days.id),
  },
  (t) => ({
    slot: unique("food_availabilities_food_id_day_id_key").on(t.foodId, t.dayId),
  })
);

export const votes = pgTable("votes", {
  id: serial("id").primaryKey(),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id),
  foodId: integer("food_id")
    .notNull()
    .references(() => foods.id),
  voteValue: integer("vote_value").notNull(),
});
