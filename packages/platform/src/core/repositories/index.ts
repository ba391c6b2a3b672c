/**
 * Repositories
 *
 * One store per entity, all bound to the same session's query interface.
 */

import type { EntityRepository, PasswordHasher } from "@foodvote/contracts";
import type {
  Category,
  CategoryCreate,
  CategoryUpdate,
  Day,
  DayCreate,
  DayUpdate,
  Food,
  FoodAvailability,
  FoodAvailabilityCreate,
  FoodAvailabilityUpdate,
  FoodCreate,
  FoodUpdate,
  UserCreate,
  UserRecord,
  UserUpdate,
  Vote,
  VoteCreate,
  VoteUpdate,
} from "@foodvote/domain";
import type { Database } from "../database/connection.js";
import { UserRepository } from "./user.repository.js";
import { FoodRepository } from "./food.repository.js";
import { DayRepository } from "./day.repository.js";
import { CategoryRepository } from "./category.repository.js";
import { FoodAvailabilityRepository } from "./food-availability.repository.js";
import { VoteRepository } from "./vote.repository.js";

export interface UserStore extends EntityRepository<UserRecord, UserCreate, UserUpdate> {
  getByEmail(email: string): Promise<UserRecord | null>;
}

export interface Repositories {
  users: UserStore;
  foods: EntityRepository<Food, FoodCreate, FoodUpdate>;
  days: EntityRepository<Day, DayCreate, DayUpdate>;
  categories: EntityRepository<Category, CategoryCreate, CategoryUpdate>;
  foodAvailabilities: EntityRepository<
    FoodAvailability,
    FoodAvailabilityCreate,
    FoodAvailabilityUpdate
  >;
  votes: EntityRepository<Vote, VoteCreate, VoteUpdate>;
}

export function createRepositories(db: Database, hasher: PasswordHasher): Repositories {
  return {
    users: new UserRepository(db, hasher),
    foods: new FoodRepository(db),
    days: new DayRepository(db),
    categories: new CategoryRepository(db),
    foodAvailabilities: new FoodAvailabilityRepository(db),
    votes: new VoteRepository(db),
  };
}

export {
  UserRepository,
  FoodRepository,
  DayRepository,
  CategoryRepository,
  FoodAvailabilityRepository,
  VoteRepository,
};
export { providedFields, isEmptyUpdate } from "./partial-update.js";
