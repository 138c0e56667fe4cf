import { notFound } from "../../errors.js";
import { ok } from "../respond.js";
import { assetQuerySchema, createAssetSchema, updateAssetSchema } from "../schemas.js";
import { authedRoute, type Route } from "../types.js";

export const assetRoutes: Route[] = [
  authedRoute("GET", "/api/assets", "user", (ctx) => {
    return ok(ctx.app.stores.assets.list(ctx.query(assetQuerySchema)));
  }),

  authedRoute("POST", "/api/assets", "user", async (ctx) => {
    const body = await ctx.readJson(createAssetSchema);
    return ok(ctx.app.stores.assets.create(body), 201);
  }),

  authedRoute("GET", "/api/assets/:id", "user", (ctx) => {
    const asset = ctx.app.stores.assets.get(ctx.params.id);
    if (!asset) throw notFound(`Asset not found: ${ctx.params.id}`);
    return ok(asset);
  }),

  authedRoute("PATCH", "/api/assets/:id", "user", async (ctx) => {
    const body = await ctx.readJson(updateAssetSchema);
    const asset = ctx.app.stores.assets.update(ctx.params.id, body);
    if (!asset) throw notFound(`Asset not found: ${ctx.params.id}`);
    return ok(asset);
  }),

  authedRoute("DELETE", "/api/assets/:id", "manager", (ctx) => {
    const { assets } = ctx.app.stores;
    const asset = assets.get(ctx.params.id);
    if (!asset) throw notFound(`Asset not found: ${ctx.params.id}`);
    assets.deactivate(asset.id);
    return ok({ id: asset.id, isActive: false });
  }),
];
