/**
 * REST Adapter
 *
 * Maps entity services to HTTP endpoints on a Fastify instance.
 * Every entity gets the same four routes:
 *
 *   GET    /{plural}/:id   — read one          200 | 404 | 422 (non-integer id)
 *   POST   /{plural}       — create            201 | 422 | 500
 *   PUT    /{plural}/:id   — partial update    200 | 404 | 422 | 500
 *   DELETE /{plural}/:id   — delete, returns the deleted record
 *
 * Bodies use snake_case keys on the wire. Ids and bodies are validated
 * before a storage session is opened, so a rejected request never holds
 * a connection.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { EntityDefinition, EntityId } from "@foodvote/contracts";
import {
  CategoryEntity,
  DayEntity,
  FoodAvailabilityEntity,
  FoodEntity,
  UserEntity,
  VoteEntity,
} from "@foodvote/domain";
import {
  NotFoundError,
  RequestValidationError,
  isStorageError,
  type FieldError,
} from "../../core/errors/index.js";
import { captureException } from "../../core/observability/index.js";
import type { EntityOperations } from "../../core/services/entity-service.js";
import type { Services } from "../../core/services/create-services.js";
import { withScope, type ScopeFactory } from "../../core/services/scope.js";
import { fromWire, toWire, toWireName } from "./wire.js";

/** Serial columns are 32-bit and start at 1 */
const MIN_ID = 1;
const MAX_ID = 2_147_483_647;

const IdParamSchema = z
  .string()
  .regex(/^-?\d+$/, "Expected an integer")
  .transform(Number);

function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.map((segment) => toWireName(String(segment))).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parses the `:id` path parameter or throws a 422.
 * Any integer is well-formed; whether a row has it is decided later.
 */
export function parseId(raw: string): EntityId {
  const result = IdParamSchema.safeParse(raw);
  if (!result.success) {
    throw new RequestValidationError(
      "Invalid id",
      toFieldErrors(result.error).map((e) => ({ ...e, field: "id" }))
    );
  }
  return result.data;
}

/**
 * Throws NotFoundError for ids no serial column can hold (0, negatives,
 * beyond 32 bits), so such lookups never open a session.
 */
export function requireStorableId(id: EntityId, label: string): void {
  if (id < MIN_ID || id > MAX_ID) {
    throw new NotFoundError(label, id);
  }
}

/** Validates a wire body against a create or update schema, or throws a 422 */
export function parseBody<T>(schema: z.ZodType<T>, body: unknown, label: string): T {
  const result = schema.safeParse(fromWire(body));
  if (!result.success) {
    throw new RequestValidationError(`Invalid ${label} payload`, toFieldErrors(result.error));
  }
  return result.data;
}

/**
 * Registers the four routes for one entity.
 * `select` picks the entity's service out of a request's services.
 */
export function registerEntityRoutes<TCreate, TUpdate, TRead extends Record<string, unknown>>(
  app: FastifyInstance,
  openScope: ScopeFactory,
  entity: EntityDefinition<TCreate, TUpdate, TRead>,
  select: (services: Services) => EntityOperations<unknown, TCreate, TUpdate>
) {
  const basePath = `/${entity.pluralName}`;
  const serialize = (record: unknown) => toWire(entity.readSchema.parse(record));

  /** GET /foods/:id — Get one */
  app.get<{ Params: { id: string } }>(`${basePath}/:id`, async (request) => {
    const id = parseId(request.params.id);
    requireStorableId(id, entity.label);
    const record = await withScope(openScope, (services) => select(services).get(id));
    return serialize(record);
  });

  /** POST /foods — Create */
  app.post(basePath, async (request, reply) => {
    const data = parseBody(entity.createSchema, request.body, entity.label);
    const record = await withScope(openScope, (services) => select(services).create(data));
    return reply.status(201).send(serialize(record));
  });

  /** PUT /foods/:id — Update the provided fields */
  app.put<{ Params: { id: string } }>(`${basePath}/:id`, async (request) => {
    const id = parseId(request.params.id);
    const changes = parseBody(entity.updateSchema, request.body, entity.label);
    requireStorableId(id, entity.label);
    const record = await withScope(openScope, (services) => select(services).update(id, changes));
    return serialize(record);
  });

  /** DELETE /foods/:id — Delete */
  app.delete<{ Params: { id: string } }>(`${basePath}/:id`, async (request) => {
    const id = parseId(request.params.id);
    requireStorableId(id, entity.label);
    const record = await withScope(openScope, (services) => select(services).delete(id));
    return serialize(record);
  });
}

/**
 * Maps errors to responses:
 *   NotFoundError          → 404 { detail: "<Label> not found" }
 *   RequestValidationError → 422 { detail: [{ field, message, code }] }
 *   Fastify client errors  → their own status, { detail: message }
 *   anything else          → 500 { detail: "Internal Server Error" }
 */
export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NotFoundError) {
      return reply.status(404).send({ detail: `${error.entity} not found` });
    }

    if (error instanceof RequestValidationError) {
      return reply.status(422).send({ detail: error.fieldErrors });
    }

    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ detail: error.message });
    }

    const category = isStorageError(error) ? "storage" : "unhandled";
    captureException(error, { category, method: request.method, url: request.url });
    return reply.status(500).send({ detail: "Internal Server Error" });
  });
}

/**
 * Registers the error handler and the routes of every entity.
 */
export function registerRESTRoutes(app: FastifyInstance, openScope: ScopeFactory) {
  registerErrorHandler(app);

  registerEntityRoutes(app, openScope, UserEntity, (s) => s.users);
  registerEntityRoutes(app, openScope, FoodEntity, (s) => s.foods);
  registerEntityRoutes(app, openScope, DayEntity, (s) => s.days);
  registerEntityRoutes(app, openScope, CategoryEntity, (s) => s.categories);
  registerEntityRoutes(app, openScope, FoodAvailabilityEntity, (s) => s.foodAvailabilities);
  registerEntityRoutes(app, openScope, VoteEntity, (s) => s.votes);
}
