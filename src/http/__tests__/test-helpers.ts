/**
 * Test helpers for HTTP API tests
 *
 * Builds an app on an in-memory database and in-memory object storage,
 * seeded with one user per role. Requests go through `server.request()`.
 */

import { z } from "zod";
import { createApp, type App } from "../../app.js";
import { hashPassword } from "../../auth/password.js";
import { createMemoryStorage } from "../../bulk/__tests__/test-helpers.js";
import { parseConfig } from "../../config/loader.js";
import { openDatabase } from "../../db/connection.js";
import { startApiServer, type ApiServer, type InProcessRequestInit } from "../server.js";

export const NOW = 1_700_000_000_000;
export const PASSWORD = "test-password";

export interface TestServer {
  app: App;
  server: ApiServer;
  /** Log in and return the bearer token */
  login(email: string, remoteIp?: string): Promise<string>;
  call(path: string, token: string | null, init?: InProcessRequestInit & { json?: unknown }): Promise<Response>;
}

const loginResponseSchema = z.object({ data: z.object({ token: z.string() }) });

export async function createTestServer(http: Record<string, unknown> = {}): Promise<TestServer> {
  const config = parseConfig({
    http,
    auth: { loginRateLimit: { windowMs: 60_000, max: 100 } },
    bulk: { storageDir: "/unused", exportSyncLimit: 2 },
  });
  const app = createApp(config, { db: openDatabase(":memory:"), storage: createMemoryStorage(), now: () => NOW });

  const passwordHash = hashPassword(PASSWORD);
  app.stores.users.create({ id: "u-admin", name: "Admin", email: "admin@example.com", role: "admin", passwordHash });
  app.stores.users.create({ id: "u-manager", name: "Manager", email: "manager@example.com", role: "manager", passwordHash });
  app.stores.users.create({ id: "u-tech", name: "Tech", email: "tech@example.com", role: "technician", passwordHash });

  const server = await startApiServer({ app, listen: false });

  const call: TestServer["call"] = (path, token, init = {}) => {
    const { json, ...rest } = init;
    const headers: Record<string, string> = { ...rest.headers };
    if (token) headers.authorization = `Bearer ${token}`;
    if (json !== undefined) headers["content-type"] = "application/json";
    return server.request(path, {
      ...rest,
      headers,
      body: json !== undefined ? JSON.stringify(json) : rest.body,
    });
  };

  return {
    app,
    server,
    call,
    async login(email, remoteIp) {
      const res = await call("/api/auth/login", null, {
        method: "POST",
        json: { email, password: PASSWORD },
        remoteIp,
      });
      return loginResponseSchema.parse(await res.json()).data.token;
    },
  };
}
