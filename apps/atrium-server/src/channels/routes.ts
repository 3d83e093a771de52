import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { channelTypeSchema, createChannel, deleteChannel, getChannel, listBusinessChannels, listChannels, updateChannel } from "./store.js";
import { getCategory } from "../categories/store.js";
import { currentUser, requireAuth } from "../http/auth.js";
import { assertPermission } from "../http/permissions.js";
import { businessParamsSchema, idParamsSchema, idSchema } from "../http/schemas.js";
import { ok } from "../http/response.js";
import { errors } from "../lib/errors.js";

const createSchema = z.object({
  businessId: idSchema,
  name: z.string().min(1).max(100),
  type: channelTypeSchema,
  categoryId: idSchema.optional(),
  order: z.number().int().nonnegative().optional(),
});

const updateSchema = createSchema.omit({ businessId: true }).partial();

function assertCategoryInBusiness(categoryId: string | undefined, businessId: string): void {
  if (categoryId === undefined) return;
  const category = getCategory(categoryId);
  if (!category || category.businessId !== businessId) {
    throw errors.badRequest("Category does not belong to this business");
  }
}

export function registerChannelRoutes(app: FastifyInstance): void {
  app.post(
    "/api/v1/channels",
    { preHandler: requireAuth, config: { activity: "channel.create" } },
    async (request, reply) => {
      const body = createSchema.parse(request.body);
      assertPermission(currentUser(request), body.businessId, "channels", "create");
      assertCategoryInBusiness(body.categoryId, body.businessId);
      return reply.code(201).send(ok("Channel created", createChannel(body)));
    }
  );

  app.get("/api/v1/channels", { preHandler: requireAuth }, async () => {
    return ok("Channels retrieved", listChannels());
  });

  app.get("/api/v1/channels/business/:businessId", { preHandler: requireAuth }, async (request) => {
    const { businessId } = businessParamsSchema.parse(request.params);
    return ok("Channels retrieved", listBusinessChannels(businessId));
  });

  app.get("/api/v1/channels/:id", { preHandler: requireAuth }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const channel = getChannel(id);
    if (!channel) throw errors.notFound("Channel");
    return ok("Channel retrieved", channel);
  });

  app.put(
    "/api/v1/channels/:id",
    { preHandler: requireAuth, config: { activity: "channel.update" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const body = updateSchema.parse(request.body);
      const channel = getChannel(id);
      if (!channel) throw errors.notFound("Channel");
      assertPermission(currentUser(request), channel.businessId, "channels", "update");
      assertCategoryInBusiness(body.categoryId, channel.businessId);
      return ok("Channel updated", updateChannel(id, body));
    }
  );

  app.delete(
    "/api/v1/channels/:id",
    { preHandler: requireAuth, config: { activity: "channel.delete" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const channel = getChannel(id);
      if (!channel) throw errors.notFound("Channel");
      assertPermission(currentUser(request), channel.businessId, "channels", "delete");
      deleteChannel(id);
      return ok("Channel deleted");
    }
  );
}
