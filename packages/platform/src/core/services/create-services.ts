/**
 * Services
 *
 * Built per request over that request's repositories.
 */

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
  Vote,
  VoteCreate,
  VoteUpdate,
} from "@foodvote/domain";
import {
  CategoryEntity,
  DayEntity,
  FoodAvailabilityEntity,
  FoodEntity,
  VoteEntity,
} from "@foodvote/domain";
import type { Repositories } from "../repositories/index.js";
import { EntityService } from "./entity-service.js";
import { UserService } from "./user.service.js";

export interface Services {
  users: UserService;
  foods: EntityService<Food, FoodCreate, FoodUpdate>;
  days: EntityService<Day, DayCreate, DayUpdate>;
  categories: EntityService<Category, CategoryCreate, CategoryUpdate>;
  foodAvailabilities: EntityService<
    FoodAvailability,
    FoodAvailabilityCreate,
    FoodAvailabilityUpdate
  >;
  votes: EntityService<Vote, VoteCreate, VoteUpdate>;
}

export function createServices(repos: Repositories): Services {
  return {
    users: new UserService(repos.users),
    foods: new EntityService(FoodEntity.label, repos.foods),
    days: new EntityService(DayEntity.label, repos.days),
    categories: new EntityService(CategoryEntity.label, repos.categories),
    foodAvailabilities: new EntityService(FoodAvailabilityEntity.label, repos.foodAvailabilities),
    votes: new EntityService(VoteEntity.label, repos.votes),
  };
}

