/**
 * Request body and query schemas (Zod)
 */

import { z } from "zod";
import { IMPORT_MODES } from "../bulk/entities.js";
import { isValidDocument } from "../bulk/handlers.js";
import { normalizeDocument } from "../store/clients.js";
import { ASSET_STATUSES, USER_ROLES, WORK_ORDER_STATUSES } from "../store/types.js";

const id = z.string().trim().min(1).max(64);
const name = z.string().trim().min(1).max(200);
const optionalText = z.string().trim().max(2000).nullable().optional();

const document = z
  .string()
  .transform(normalizeDocument)
  .refine(isValidDocument, { message: "Document must have 11 or 14 digits" })
  .nullable()
  .optional();

export const loginSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

export const createUserSchema = z.object({
  id: id.optional(),
  name,
  email: z.string().trim().email(),
  role: z.enum(USER_ROLES).optional(),
  password: z.string().min(8).optional(),
  isActive: z.boolean().optional(),
});

export const updateUserSchema = createUserSchema.omit({ id: true }).partial();

export const createClientSchema = z.object({
  id: id.optional(),
  name,
  document,
  address: optionalText,
  isActive: z.boolean().optional(),
});

export const updateClientSchema = createClientSchema.omit({ id: true }).partial();

export const createAssetSchema = z.object({
  id: id.optional(),
  clientId: id,
  name,
  type: optionalText,
  location: optionalText,
  status: z.enum(ASSET_STATUSES).optional(),
  isActive: z.boolean().optional(),
});

export const updateAssetSchema = createAssetSchema.omit({ id: true }).partial();

export const createWorkOrderSchema = z.object({
  id: id.optional(),
  clientId: id,
  assetId: id.nullable().optional(),
  title: name,
  description: optionalText,
  status: z.enum(WORK_ORDER_STATUSES).optional(),
});

export const updateWorkOrderSchema = createWorkOrderSchema.omit({ id: true }).partial();

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1")
  .optional();

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
  search: z.string().trim().min(1).optional(),
  includeInactive: flag,
});

export const userQuerySchema = pageQuerySchema.extend({
  role: z.enum(USER_ROLES).optional(),
});

export const clientQuerySchema = pageQuerySchema.extend({
  document: z.string().trim().min(1).optional(),
});

export const assetQuerySchema = pageQuerySchema.extend({
  clientId: z.string().min(1).optional(),
  status: z.enum(ASSET_STATUSES).optional(),
});

export const workOrderQuerySchema = pageQuerySchema.extend({
  clientId: z.string().min(1).optional(),
  assetId: z.string().min(1).optional(),
  status: z.enum(WORK_ORDER_STATUSES).optional(),
});

export const uploadQuerySchema = z.object({
  filename: z.string({ required_error: "filename query parameter is required" }).trim().min(1),
  mode: z.enum(IMPORT_MODES).default("upsert"),
});

export const importListQuerySchema = z.object({
  entity: z.string().optional(),
  status: z.string().optional(),
});
