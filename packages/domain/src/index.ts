/**
 * @foodvote/domain
 *
 * Exports all entity definitions, their shape types, and seed data.
 * The platform imports this to build storage and routes for each entity.
 */

export {
  UserEntity,
  UserSchema,
  UserRecordSchema,
  UserCreateSchema,
  UserUpdateSchema,
} from "./entities/user/user.entity.js";
export type { User, UserRecord, UserCreate, UserUpdate } from "./entities/user/user.entity.js";

export {
  FoodEntity,
  FoodSchema,
  FoodCreateSchema,
  FoodUpdateSchema,
} from "./entities/food/food.entity.js";
export type { Food, FoodCreate, FoodUpdate } from "./entities/food/food.entity.js";

export {
  DayEntity,
  DaySchema,
  DayCreateSchema,
  DayUpdateSchema,
} from "./entities/day/day.entity.js";
export type { Day, DayCreate, DayUpdate } from "./entities/day/day.entity.js";

export {
  CategoryEntity,
  CategorySchema,
  CategoryCreateSchema,
  CategoryUpdateSchema,
} from "./entities/category/category.entity.js";
export type { Category, CategoryCreate, CategoryUpdate } from "./entities/category/category.entity.js";

export {
  FoodAvailabilityEntity,
  FoodAvailabilitySchema,
  FoodAvailabilityCreateSchema,
  FoodAvailabilityUpdateSchema,
} from "./entities/food-availability/food-availability.entity.js";
export type {
  FoodAvailability,
  FoodAvailabilityCreate,
  FoodAvailabilityUpdate,
} from "./entities/food-availability/food-availability.entity.js";

export {
  VoteEntity,
  VoteSchema,
  VoteCreateSchema,
  VoteUpdateSchema,
} from "./entities/vote/vote.entity.js";
export type { Vote, VoteCreate, VoteUpdate } from "./entities/vote/vote.entity.js";

export { seedData } from "./seed.js";
export type { SeedData, FoodSeed } from "./seed.js";
