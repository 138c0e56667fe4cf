import { hashPassword } from "../../auth/password.js";
import { badRequest, notFound } from "../../errors.js";
import { renderUser } from "../render.js";
import { ok } from "../respond.js";
import { createUserSchema, updateUserSchema, userQuerySchema } from "../schemas.js";
import { authedRoute, type Route } from "../types.js";

export const userRoutes: Route[] = [
  authedRoute("GET", "/api/users", "admin", (ctx) => {
    const query = ctx.query(userQuerySchema);
    return ok(ctx.app.stores.users.list(query).map(renderUser));
  }),

  authedRoute("POST", "/api/users", "admin", async (ctx) => {
    const body = await ctx.readJson(createUserSchema);
    const user = ctx.app.stores.users.create({
      id: body.id,
      name: body.name,
      email: body.email,
      role: body.role,
      passwordHash: body.password ? hashPassword(body.password) : undefined,
      isActive: body.isActive,
    });
    ctx.app.stores.audit.insert({
      time: ctx.app.now(),
      userId: ctx.user.id,
      action: "user.create",
      resourceType: "user",
      resourceId: user.id,
      metadata: { role: user.role },
    });
    return ok(renderUser(user), 201);
  }),

  authedRoute("GET", "/api/users/:id", "admin", (ctx) => {
    const user = ctx.app.stores.users.get(ctx.params.id);
    if (!user) throw notFound(`User not found: ${ctx.params.id}`);
    return ok(renderUser(user));
  }),

  authedRoute("PATCH", "/api/users/:id", "admin", async (ctx) => {
    const body = await ctx.readJson(updateUserSchema);
    if (ctx.params.id === ctx.user.id) {
      if (body.isActive === false) throw badRequest("You cannot deactivate your own account");
      if (body.role !== undefined && body.role !== ctx.user.role) {
        throw badRequest("You cannot change your own role");
      }
    }
    const { users } = ctx.app.stores;
    const updated = users.update(ctx.params.id, {
      name: body.name,
      email: body.email,
      role: body.role,
      isActive: body.isActive,
    });
    if (!updated) throw notFound(`User not found: ${ctx.params.id}`);
    if (body.password) {
      users.setPassword(updated.id, hashPassword(body.password));
    }
    if (body.isActive === false || body.password) {
      ctx.app.stores.sessions.revokeAllForUser(updated.id, ctx.app.now());
    }
    return ok(renderUser(updated));
  }),

  authedRoute("DELETE", "/api/users/:id", "admin", (ctx) => {
    const { users, sessions, audit } = ctx.app.stores;
    const user = users.get(ctx.params.id);
    if (!user) throw notFound(`User not found: ${ctx.params.id}`);
    if (user.id === ctx.user.id) throw badRequest("You cannot deactivate your own account");
    users.deactivate(user.id);
    sessions.revokeAllForUser(user.id, ctx.app.now());
    audit.insert({
      time: ctx.app.now(),
      userId: ctx.user.id,
      action: "user.deactivate",
      resourceType: "user",
      resourceId: user.id,
      metadata: null,
    });
    return ok({ id: user.id, isActive: false });
  }),
];
