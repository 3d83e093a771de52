import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import type { Database } from "@atrium/protocol";
import {
  cellValueSchema,
  createDatabase,
  deleteDatabase,
  getDatabase,
  listChannelDatabases,
  updateDatabase,
} from "./store.js";
import {
  addOption,
  addRow,
  buildColumns,
  deleteColumn,
  deleteOption,
  deleteRow,
  findColumn,
  findOption,
  findRow,
  replaceColumns,
  updateColumn,
  updateOption,
  updateRow,
} from "./document.js";
import { getChannel } from "../channels/store.js";
import { currentUser, requireAuth } from "../http/auth.js";
import { idSchema } from "../http/schemas.js";
import { ok } from "../http/response.js";
import { errors } from "../lib/errors.js";

const columnTypeSchema = z.enum(["date", "text", "select", "boolean", "number"]);

const optionInputSchema = z.object({
  id: idSchema.optional(),
  value: z.string().min(1),
  order: z.number().int().nonnegative().optional(),
});

const columnInputSchema = z.object({
  id: idSchema.optional(),
  name: z.string().min(1).max(100),
  type: columnTypeSchema,
  options: z.array(optionInputSchema).optional(),
  order: z.number().int().nonnegative().optional(),
});

const createSchema = z.object({
  channelId: idSchema,
  title: z.string().min(3).max(200),
  columns: z.array(columnInputSchema).default([]),
});

const updateSchema = z.object({
  title: z.string().min(3).max(200).optional(),
  columns: z.array(columnInputSchema).optional(),
});

const rowSchema = z.object({
  values: z.record(cellValueSchema).default({}),
});

const columnUpdateSchema = columnInputSchema.omit({ id: true }).partial();

const optionUpdateSchema = optionInputSchema.omit({ id: true }).partial();

const databaseParams = z.object({ id: idSchema });
const rowParams = databaseParams.extend({ rowId: idSchema });
const columnParams = databaseParams.extend({ columnId: idSchema });
const optionParams = columnParams.extend({ optionId: idSchema });

function loadDatabase(id: string): Database {
  const doc = getDatabase(id);
  if (!doc) throw errors.notFound("Database");
  return doc;
}

/** Only the author may change a database or anything inside it */
function loadOwnDatabase(request: FastifyRequest, id: string): Database {
  const doc = loadDatabase(id);
  if (doc.authorId !== currentUser(request).id) {
    throw errors.forbidden("Only the author can modify this database");
  }
  return doc;
}

function mutate<T>(id: string, fn: (doc: Database) => { doc: Database; item: T }): { doc: Database; item: T } {
  const result = updateDatabase(id, fn);
  if (!result) throw errors.notFound("Database");
  return result;
}

export function registerDatabaseRoutes(app: FastifyInstance): void {
  const auth = { preHandler: requireAuth };

  app.post("/api/v1/databases", { ...auth, config: { activity: "database.create" } }, async (request, reply) => {
    const body = createSchema.parse(request.body);
    if (!getChannel(body.channelId)) throw errors.notFound("Channel");
    const doc = createDatabase({
      channelId: body.channelId,
      authorId: currentUser(request).id,
      title: body.title,
      columns: buildColumns(body.columns),
    });
    return reply.code(201).send(ok("Database created", doc));
  });

  app.get("/api/v1/databases/channel/:channelId", auth, async (request) => {
    const { channelId } = z.object({ channelId: idSchema }).parse(request.params);
    return ok("Databases retrieved", listChannelDatabases(channelId));
  });

  app.get("/api/v1/databases/:id", auth, async (request) => {
    const { id } = databaseParams.parse(request.params);
    return ok("Database retrieved", loadDatabase(id));
  });

  app.put("/api/v1/databases/:id", { ...auth, config: { activity: "database.update" } }, async (request) => {
    const { id } = databaseParams.parse(request.params);
    const body = updateSchema.parse(request.body);
    loadOwnDatabase(request, id);
    const { doc } = mutate(id, (current) => {
      let next = body.columns ? replaceColumns(current, body.columns) : current;
      if (body.title !== undefined) next = { ...next, title: body.title };
      return { doc: next, item: null };
    });
    return ok("Database updated", doc);
  });

  app.delete("/api/v1/databases/:id", { ...auth, config: { activity: "database.delete" } }, async (request) => {
    const { id } = databaseParams.parse(request.params);
    loadOwnDatabase(request, id);
    deleteDatabase(id);
    return ok("Database deleted");
  });

  // Rows

  app.post("/api/v1/databases/:id/rows", { ...auth, config: { activity: "database.row.create" } }, async (request, reply) => {
    const { id } = databaseParams.parse(request.params);
    const body = rowSchema.parse(request.body);
    loadOwnDatabase(request, id);
    const { item } = mutate(id, (doc) => addRow(doc, body.values));
    return reply.code(201).send(ok("Row added", item));
  });

  app.get("/api/v1/databases/:id/rows", auth, async (request) => {
    const { id } = databaseParams.parse(request.params);
    return ok("Rows retrieved", loadDatabase(id).rows);
  });

  app.get("/api/v1/databases/:id/rows/:rowId", auth, async (request) => {
    const { id, rowId } = rowParams.parse(request.params);
    return ok("Row retrieved", findRow(loadDatabase(id), rowId));
  });

  app.put("/api/v1/databases/:id/rows/:rowId", { ...auth, config: { activity: "database.row.update" } }, async (request) => {
    const { id, rowId } = rowParams.parse(request.params);
    const body = rowSchema.parse(request.body);
    loadOwnDatabase(request, id);
    const { item } = mutate(id, (doc) => updateRow(doc, rowId, body.values));
    return ok("Row updated", item);
  });

  app.delete("/api/v1/databases/:id/rows/:rowId", { ...auth, config: { activity: "database.row.delete" } }, async (request) => {
    const { id, rowId } = rowParams.parse(request.params);
    loadOwnDatabase(request, id);
    mutate(id, (doc) => ({ doc: deleteRow(doc, rowId), item: null }));
    return ok("Row deleted");
  });

  // Columns

  app.get("/api/v1/databases/:id/columns/:columnId", auth, async (request) => {
    const { id, columnId } = columnParams.parse(request.params);
    return ok("Column retrieved", findColumn(loadDatabase(id), columnId));
  });

  app.put(
    "/api/v1/databases/:id/columns/:columnId",
    { ...auth, config: { activity: "database.column.update" } },
    async (request) => {
      const { id, columnId } = columnParams.parse(request.params);
      const body = columnUpdateSchema.parse(request.body);
      loadOwnDatabase(request, id);
      const { item } = mutate(id, (doc) => updateColumn(doc, columnId, body));
      return ok("Column updated", item);
    }
  );

  app.delete(
    "/api/v1/databases/:id/columns/:columnId",
    { ...auth, config: { activity: "database.column.delete" } },
    async (request) => {
      const { id, columnId } = columnParams.parse(request.params);
      loadOwnDatabase(request, id);
      mutate(id, (doc) => ({ doc: deleteColumn(doc, columnId), item: null }));
      return ok("Column deleted");
    }
  );

  // Select options

  app.post(
    "/api/v1/databases/:id/columns/:columnId/options",
    { ...auth, config: { activity: "database.option.create" } },
    async (request, reply) => {
      const { id, columnId } = columnParams.parse(request.params);
      const body = optionInputSchema.omit({ id: true }).parse(request.body);
      loadOwnDatabase(request, id);
      const { item } = mutate(id, (doc) => addOption(doc, columnId, body));
      return reply.code(201).send(ok("Option added", item));
    }
  );

  app.get("/api/v1/databases/:id/columns/:columnId/options/:optionId", auth, async (request) => {
    const { id, columnId, optionId } = optionParams.parse(request.params);
    return ok("Option retrieved", findOption(loadDatabase(id), columnId, optionId));
  });

  app.put(
    "/api/v1/databases/:id/columns/:columnId/options/:optionId",
    { ...auth, config: { activity: "database.option.update" } },
    async (request) => {
      const { id, columnId, optionId } = optionParams.parse(request.params);
      const body = optionUpdateSchema.parse(request.body);
      loadOwnDatabase(request, id);
      const { item } = mutate(id, (doc) => updateOption(doc, columnId, optionId, body));
      return ok("Option updated", item);
    }
  );

  app.delete(
    "/api/v1/databases/:id/columns/:columnId/options/:optionId",
    { ...auth, config: { activity: "database.option.delete" } },
    async (request) => {
      const { id, columnId, optionId } = optionParams.parse(request.params);
      loadOwnDatabase(request, id);
      mutate(id, (doc) => ({ doc: deleteOption(doc, columnId, optionId), item: null }));
      return ok("Option deleted");
    }
  );
}
