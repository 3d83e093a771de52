import type { FastifyInstance } from "fastify";
import { authenticateToken } from "../http/auth.js";
import { getChannel } from "../channels/store.js";
import { errors } from "../lib/errors.js";
import { isId } from "../lib/ids.js";
import { handleConnection, type MessagingContext } from "./handler.js";

interface MessagingRoute {
  Params: { channelId: string };
  Querystring: { token?: string };
}

/**
 * Browsers cannot set headers on a WebSocket handshake, so the token rides
 * in the query string. Everything is checked before the upgrade happens.
 */
export function registerMessagingRoutes(app: FastifyInstance, ctx: MessagingContext): void {
  app.get<MessagingRoute>(
    "/api/v1/ws/messages/:channelId",
    {
      websocket: true,
      preValidation: async (request) => {
        const { token } = request.query;
        if (!token) {
          throw errors.unauthorized("Missing token");
        }
        const user = await authenticateToken(token);
        if (!user) {
          throw errors.unauthorized("Invalid or expired token");
        }
        const { channelId } = request.params;
        if (!isId(channelId)) {
          throw errors.badRequest("Invalid channel ID");
        }
        if (!getChannel(channelId)) {
          throw errors.notFound("Channel");
        }
        request.user = user;
      },
    },
    (socket, request) => {
      const user = request.user;
      if (!user) {
        socket.close(1008, "unauthorized");
        return;
      }
      handleConnection(socket, { channelId: request.params.channelId, userId: user.id }, ctx);
    }
  );
}
