/**
 * Seed data for development/demo purposes.
 *
 * Foods reference their day and category by name; the seed script
 * resolves names to ids after inserting the parents, since ids are
 * assigned at insert time.
 */

import type { DayCreate } from "./entities/day/day.entity.js";
import type { CategoryCreate } from "./entities/category/category.entity.js";
import type { UserCreate } from "./entities/user/user.entity.js";

export interface FoodSeed {
  name: string;
  price: number;
  description?: string;
  /** Name of a seeded day; the food is also made available on it */
  day: string;
  /** Name of a seeded category */
  category: string;
}

export interface SeedData {
  days: DayCreate[];
  categories: CategoryCreate[];
  users: UserCreate[];
  foods: FoodSeed[];
}

export const seedData: SeedData = {
  days: [
    { name: "Monday" },
    { name: "Tuesday" },
    { name: "Wednesday" },
    { name: "Thursday" },
    { name: "Friday" },
    { name: "Saturday" },
    { name: "Sunday" },
  ],
  categories: [
    { name: "Soup" },
    { name: "Main" },
    { name: "Salad" },
    { name: "Dessert" },
  ],
  users: [
    { username: "demo", email: "demo@example.com", password: "demo-password" },
  ],
  foods: [
    { name: "Tomato soup", price: 4.5, description: "Roasted tomatoes and basil.", day: "Monday", category: "Soup" },
    { name: "Lentil curry", price: 8.0, day: "Tuesday", category: "Main" },
    { name: "Caesar salad", price: 6.5, description: "Romaine, croutons, parmesan.", day: "Wednesday", category: "Salad" },
    { name: "Mushroom risotto", price: 9.5, day: "Thursday", category: "Main" },
    { name: "Apple crumble", price: 3.75, day: "Friday", category: "Dessert" },
  ],
};
