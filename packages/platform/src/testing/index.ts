export {
  InMemoryRepository,
  InMemoryUserRepository,
  createInMemoryRepositories,
  createInMemoryScopeFactory,
  fakeHash,
  type InMemoryRepositories,
  type InMemoryRepositoryOptions,
} from "./in-memory.js";
