export { createServices, type Services } from "./create-services.js";
export { EntityService, type EntityOperations } from "./entity-service.js";
export { UserService } from "./user.service.js";
export { createScopeFactory, withScope, type RequestScope, type ScopeFactory } from "./scope.js";
