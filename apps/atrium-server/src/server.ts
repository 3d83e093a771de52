import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { getDb } from "./db/database.js";
import { loggerOptions, moduleLogger } from "./lib/logger.js";
import { registerErrorHandler } from "./http/error-handler.js";
import { registerActivityHook, registerActivityRoutes } from "./activity/routes.js";
import { registerAuthRoutes } from "./auth/routes.js";
import { registerUserRoutes } from "./users/routes.js";
import { registerBusinessRoutes } from "./businesses/routes.js";
import { registerCategoryRoutes } from "./categories/routes.js";
import { registerChannelRoutes } from "./channels/routes.js";
import { registerRoleRoutes } from "./roles/routes.js";
import { registerDatabaseRoutes } from "./databases/routes.js";
import { registerMessagingRoutes } from "./ws/route.js";
import { ConnectionRegistry } from "./ws/connections.js";
import { Broadcaster } from "./ws/broadcast.js";
import type { MessagingContext } from "./ws/handler.js";
import { createSqliteMessageStore } from "./messages/store.js";
import config from "./config.js";

export interface Server {
  app: FastifyInstance;
  messaging: MessagingContext;
}

/** Build the app over an already initialized database; does not listen */
export async function createServer(): Promise<Server> {
  const log = moduleLogger("ws");
  const registry = new ConnectionRegistry();
  const messaging: MessagingContext = {
    registry,
    broadcaster: new Broadcaster(registry, log),
    store: createSqliteMessageStore(getDb()),
    timeoutMs: config.storeTimeoutMs,
    historyDefaultLimit: config.historyDefaultLimit,
    log,
  };

  const app = Fastify({ logger: loggerOptions });
  app.decorateRequest("user", null);
  registerErrorHandler(app);
  registerActivityHook(app);

  await app.register(cors, { origin: config.corsOrigin });
  await app.register(websocket);

  registerAuthRoutes(app);
  registerUserRoutes(app);
  registerBusinessRoutes(app);
  registerCategoryRoutes(app);
  registerChannelRoutes(app);
  registerRoleRoutes(app);
  registerDatabaseRoutes(app);
  registerActivityRoutes(app);
  registerMessagingRoutes(app, messaging);

  // Health check
  app.get("/health", async () => ({ status: "ok" }));

  return { app, messaging };
}
