import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes, type ApiDeps } from "./routes/index.js";

/**
 * Build the HTTP app without listening, so tests can drive it with inject()
 */
export async function buildServer(
  deps: ApiDeps,
  options: { logger?: boolean } = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : fastifyLoggerConfig,
  });

  await app.register(cors, {
    origin: true,
  });

  // OpenAPI must be registered before the routes it documents
  await app.register(openapi);
  await app.register(errorHandler);
  await registerApiRoutes(app, deps);

  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
