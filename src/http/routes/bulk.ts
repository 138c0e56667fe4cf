import { hasRole } from "../../auth/roles.js";
import { isBulkEntity, type BulkEntity } from "../../bulk/entities.js";
import { ApiError, badRequest } from "../../errors.js";
import { renderExportJob, renderImportJob } from "../render.js";
import { ok, sendCsv } from "../respond.js";
import { importListQuerySchema, uploadQuerySchema } from "../schemas.js";
import { authedRoute, type AuthedContext, type Route } from "../types.js";

/** Users carry roles, so bulk access to them needs the same role as /api/users. */
function requireEntityAccess(ctx: AuthedContext, entity: BulkEntity): BulkEntity {
  if (entity === "users" && !hasRole(ctx.user.role, "admin")) {
    throw new ApiError(403, "ERR_FORBIDDEN", "Requires admin role");
  }
  return entity;
}

function parseEntity(ctx: AuthedContext, value: string): BulkEntity {
  if (!isBulkEntity(value)) throw badRequest(`Unknown entity: ${value}`);
  return requireEntityAccess(ctx, value);
}

function importJobFor(ctx: AuthedContext) {
  const job = ctx.app.bulk.getImportJob(ctx.params.jobId);
  requireEntityAccess(ctx, job.entity);
  return job;
}

function exportJobFor(ctx: AuthedContext) {
  const job = ctx.app.bulk.getExportJob(ctx.params.jobId);
  requireEntityAccess(ctx, job.entity);
  return job;
}

export const bulkRoutes: Route[] = [
  authedRoute("GET", "/api/bulk/entities", "manager", (ctx) => ok(ctx.app.bulk.listEntities())),

  authedRoute("GET", "/api/bulk/templates/:entity", "manager", (ctx) => {
    return sendCsv(ctx.app.bulk.template(parseEntity(ctx, ctx.params.entity)));
  }),

  authedRoute("POST", "/api/bulk/import/:entity/upload", "manager", async (ctx) => {
    const entity = parseEntity(ctx, ctx.params.entity);
    const query = ctx.query(uploadQuerySchema);
    const content = await ctx.readBody(ctx.app.config.bulk.maxFileBytes);
    const job = await ctx.app.bulk.upload({
      entity,
      mode: query.mode,
      fileName: query.filename,
      content,
      userId: ctx.user.id,
    });
    return ok(renderImportJob(job), 201);
  }),

  authedRoute("POST", "/api/bulk/import/:jobId/validate", "manager", async (ctx) => {
    const result = await ctx.app.bulk.validate(importJobFor(ctx).id);
    return ok({ job: renderImportJob(result.job), preview: result.preview });
  }),

  authedRoute("POST", "/api/bulk/import/:jobId/confirm", "manager", (ctx) => {
    const job = ctx.app.bulk.confirm(importJobFor(ctx).id, ctx.user.id);
    return ok({ status: job.status, job: renderImportJob(job) }, 202);
  }),

  authedRoute("GET", "/api/bulk/import", "manager", (ctx) => {
    const query = ctx.query(importListQuerySchema);
    const isAdmin = hasRole(ctx.user.role, "admin");
    const jobs = ctx.app.bulk.listImportJobs(query).filter((job) => isAdmin || job.entity !== "users");
    return ok(jobs.map(renderImportJob));
  }),

  authedRoute("GET", "/api/bulk/import/:jobId", "manager", (ctx) => {
    return ok(renderImportJob(importJobFor(ctx)));
  }),

  authedRoute("GET", "/api/bulk/import/:jobId/errors", "manager", (ctx) => {
    return ok({ errors: ctx.app.bulk.listRowErrors(importJobFor(ctx).id) });
  }),

  authedRoute("GET", "/api/bulk/import/:jobId/error-report", "manager", async (ctx) => {
    return sendCsv(await ctx.app.bulk.errorReport(importJobFor(ctx).id));
  }),

  authedRoute("GET", "/api/bulk/export/:entity", "manager", (ctx) => {
    const result = ctx.app.bulk.exportEntity(parseEntity(ctx, ctx.params.entity), ctx.user.id);
    if (result.kind === "inline") return sendCsv(result.file);
    return ok(renderExportJob(result.job), 202);
  }),

  authedRoute("GET", "/api/bulk/export-jobs", "manager", (ctx) => {
    const isAdmin = hasRole(ctx.user.role, "admin");
    const jobs = ctx.app.bulk.listExportJobs().filter((job) => isAdmin || job.entity !== "users");
    return ok(jobs.map(renderExportJob));
  }),

  authedRoute("GET", "/api/bulk/export-jobs/:jobId", "manager", (ctx) => {
    return ok(renderExportJob(exportJobFor(ctx)));
  }),

  authedRoute("GET", "/api/bulk/export-jobs/:jobId/download", "manager", async (ctx) => {
    return sendCsv(await ctx.app.bulk.downloadExport(exportJobFor(ctx).id));
  }),
];
