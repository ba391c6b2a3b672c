/**
 * HTTP Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * request logging, the health check and every entity route. Does not
 * listen; index.ts does, and tests call inject() instead.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import {
  logRequest,
  registerRESTRoutes,
  type AppConfig,
  type ScopeFactory,
} from "@foodvote/platform";

export interface ServerOptions {
  config: AppConfig;
  /** Opens one storage scope per entity request */
  openScope: ScopeFactory;
}

const HEALTH_PATH = "/health";

export async function createServer({ config, openScope }: ServerOptions): Promise<FastifyInstance> {
  const isProd = config.env === "production";

  const app = Fastify({
    logger: false, // structured logging goes through logRequest
    // Behind a reverse proxy the rate limiter needs the real client IP
    trustProxy: isProd,
  });

  await app.register(helmet, {
    contentSecurityPolicy: isProd,
  });

  // The health check gets a much higher ceiling than entity routes
  await app.register(rateLimit, {
    max: (request) => (request.routeOptions.url === HEALTH_PATH ? 10_000 : config.rateLimit.max),
    timeWindow: config.rateLimit.windowMs,
  });

  await app.register(cors, {
    origin: config.cors.origin,
    credentials: true,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
  });

  app.addHook("onResponse", async (request, reply) => {
    logRequest({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  app.get(HEALTH_PATH, async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  registerRESTRoutes(app, openScope);

  return app;
}
