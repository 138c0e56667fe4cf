/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

export const rateLimitSchema = z.object({
  windowMs: z.number().int().positive(),
  max: z.number().int().positive(),
});

export const httpConfigSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(8080),
  /** IPs or CIDR ranges allowed to call the API. Empty list = everyone. */
  allowlist: z.array(z.string()).default([]),
  corsOrigins: z.array(z.string()).default([]),
  maxBodyBytes: z
    .number()
    .int()
    .positive()
    .default(1024 * 1024),
});

export const databaseConfigSchema = z.object({
  sqlitePath: z.string().default("${OPSDESK_HOME}/opsdesk.db"),
});

export const authConfigSchema = z.object({
  tokenTtlMs: z
    .number()
    .int()
    .positive()
    .default(12 * 60 * 60 * 1000),
  loginRateLimit: rateLimitSchema.default({ windowMs: 60_000, max: 10 }),
  /** Created (or promoted to admin) on `serve` when set */
  bootstrapOwner: z
    .object({
      email: z.string().email(),
      password: z.string().min(8),
      name: z.string().default("Owner"),
    })
    .optional(),
});

export const bulkConfigSchema = z.object({
  storageDir: z.string().default("${OPSDESK_HOME}/storage"),
  maxFileBytes: z
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
  /** Exports with at most this many records are returned inline */
  exportSyncLimit: z.number().int().nonnegative().default(2000),
});

export const configSchema = z.object({
  http: httpConfigSchema.default({}),
  database: databaseConfigSchema.default({}),
  auth: authConfigSchema.default({}),
  bulk: bulkConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type HttpConfig = z.infer<typeof httpConfigSchema>;
export type AuthConfig = z.infer<typeof authConfigSchema>;
export type BulkConfig = z.infer<typeof bulkConfigSchema>;
export type RateLimitConfig = z.infer<typeof rateLimitSchema>;
