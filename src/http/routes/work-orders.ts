import { ApiError, notFound } from "../../errors.js";
import type { Stores } from "../../store/index.js";
import { ok } from "../respond.js";
import { createWorkOrderSchema, updateWorkOrderSchema, workOrderQuerySchema } from "../schemas.js";
import { authedRoute, type Route } from "../types.js";

/** A work order's asset must belong to the same client. */
function checkAssetOwnership(stores: Stores, clientId: string, assetId: string | null | undefined): void {
  if (!assetId) return;
  const asset = stores.assets.get(assetId);
  if (!asset) {
    throw new ApiError(422, "ERR_INVALID_REFERENCE", `Asset not found: ${assetId}`);
  }
  if (asset.clientId !== clientId) {
    throw new ApiError(422, "ERR_VALIDATION", "Asset does not belong to the work order's client");
  }
}

export const workOrderRoutes: Route[] = [
  authedRoute("GET", "/api/work-orders", "user", (ctx) => {
    return ok(ctx.app.stores.workOrders.list(ctx.query(workOrderQuerySchema)));
  }),

  authedRoute("POST", "/api/work-orders", "user", async (ctx) => {
    const body = await ctx.readJson(createWorkOrderSchema);
    const { stores } = ctx.app;
    checkAssetOwnership(stores, body.clientId, body.assetId);
    const workOrder = stores.workOrders.create(
      { ...body, createdBy: ctx.user.id },
      new Date(ctx.app.now())
    );
    return ok(workOrder, 201);
  }),

  authedRoute("GET", "/api/work-orders/:id", "user", (ctx) => {
    const workOrder = ctx.app.stores.workOrders.get(ctx.params.id);
    if (!workOrder) throw notFound(`Work order not found: ${ctx.params.id}`);
    return ok(workOrder);
  }),

  authedRoute("PATCH", "/api/work-orders/:id", "user", async (ctx) => {
    const body = await ctx.readJson(updateWorkOrderSchema);
    const { workOrders } = ctx.app.stores;
    const current = workOrders.get(ctx.params.id);
    if (!current) throw notFound(`Work order not found: ${ctx.params.id}`);

    if (body.clientId !== undefined || body.assetId !== undefined) {
      checkAssetOwnership(
        ctx.app.stores,
        body.clientId ?? current.clientId,
        body.assetId === undefined ? current.assetId : body.assetId
      );
    }
    const updated = workOrders.update(current.id, body, new Date(ctx.app.now()));
    if (!updated) throw notFound(`Work order not found: ${ctx.params.id}`);
    return ok(updated);
  }),

  authedRoute("POST", "/api/work-orders/:id/close", "user", (ctx) => {
    const workOrder = ctx.app.stores.workOrders.close(ctx.params.id, new Date(ctx.app.now()));
    if (!workOrder) throw notFound(`Work order not found: ${ctx.params.id}`);
    return ok(workOrder);
  }),

  authedRoute("DELETE", "/api/work-orders/:id", "manager", (ctx) => {
    const { workOrders } = ctx.app.stores;
    const workOrder = workOrders.get(ctx.params.id);
    if (!workOrder) throw notFound(`Work order not found: ${ctx.params.id}`);
    workOrders.deactivate(workOrder.id);
    return ok({ id: workOrder.id, isActive: false });
  }),
];
