import { notFound } from "../../errors.js";
import { ok } from "../respond.js";
import { clientQuerySchema, createClientSchema, updateClientSchema } from "../schemas.js";
import { authedRoute, type Route } from "../types.js";

export const clientRoutes: Route[] = [
  authedRoute("GET", "/api/clients", "user", (ctx) => {
    return ok(ctx.app.stores.clients.list(ctx.query(clientQuerySchema)));
  }),

  authedRoute("POST", "/api/clients", "user", async (ctx) => {
    const body = await ctx.readJson(createClientSchema);
    return ok(ctx.app.stores.clients.create(body), 201);
  }),

  authedRoute("GET", "/api/clients/:id", "user", (ctx) => {
    const client = ctx.app.stores.clients.get(ctx.params.id);
    if (!client) throw notFound(`Client not found: ${ctx.params.id}`);
    return ok(client);
  }),

  authedRoute("PATCH", "/api/clients/:id", "user", async (ctx) => {
    const body = await ctx.readJson(updateClientSchema);
    const client = ctx.app.stores.clients.update(ctx.params.id, body);
    if (!client) throw notFound(`Client not found: ${ctx.params.id}`);
    return ok(client);
  }),

  authedRoute("DELETE", "/api/clients/:id", "manager", (ctx) => {
    const { clients } = ctx.app.stores;
    const client = clients.get(ctx.params.id);
    if (!client) throw notFound(`Client not found: ${ctx.params.id}`);
    clients.deactivate(client.id);
    return ok({ id: client.id, isActive: false });
  }),
];
