/**
 * Demo Seeding
 *
 * Inserts the demo data through the service layer, parents first:
 * days and categories, users, foods (each made available on its day),
 * then one vote from the first user on every food.
 */

import type { SeedData } from "@foodvote/domain";
import { createLogger, type Services } from "@foodvote/platform";

const logger = createLogger("seed");

export interface SeedSummary {
  days: number;
  categories: number;
  users: number;
  foods: number;
  availabilities: number;
  votes: number;
}

function lookup(ids: Map<string, number>, kind: string, name: string, food: string): number {
  const id = ids.get(name);
  if (id === undefined) {
    throw new Error(`Food "${food}" references unknown ${kind} "${name}"`);
  }
  return id;
}

export async function seedDatabase(services: Services, data: SeedData): Promise<SeedSummary> {
  const dayIds = new Map<string, number>();
  for (const day of data.days) {
    const created = await services.days.create(day);
    dayIds.set(created.name, created.id);
  }

  const categoryIds = new Map<string, number>();
  for (const category of data.categories) {
    const created = await services.categories.create(category);
    categoryIds.set(created.name, created.id);
  }

  const userIds: number[] = [];
  for (const user of data.users) {
    const created = await services.users.create(user);
    userIds.push(created.id);
  }

  if (data.foods.length > 0 && userIds.length === 0) {
    throw new Error("Seeding foods needs at least one user");
  }
  const creatorId = userIds[0];

  let availabilities = 0;
  let votes = 0;
  for (const seed of data.foods) {
    const dayId = lookup(dayIds, "day", seed.day, seed.name);
    const categoryId = lookup(categoryIds, "category", seed.category, seed.name);

    const food = await services.foods.create({
      name: seed.name,
      price: seed.price,
      description: seed.description ?? null,
      creatorId,
      dayId,
      categoryId,
    });

    await services.foodAvailabilities.create({ foodId: food.id, dayId });
    availabilities++;

    await services.votes.create({ userId: creatorId, foodId: food.id, voteValue: 1 });
    votes++;
  }

  const summary: SeedSummary = {
    days: dayIds.size,
    categories: categoryIds.size,
    users: userIds.length,
    foods: data.foods.length,
    availabilities,
    votes,
  };
  logger.info("Seeded demo data", { ...summary });
  return summary;
}
