/**
 * HTTP API server
 *
 * Route organization:
 * - /api/health, /api/auth/login: no auth
 * - /api/me, /api/auth/logout, /api/clients, /api/assets, /api/work-orders: bearer token
 * - /api/users: admin
 * - /api/bulk/*: manager
 *
 * The handler works on a transport-independent request so `request()` can
 * drive it in-process without a listening socket.
 */

import http from "node:http";
import { Readable } from "node:stream";
import type { App } from "../app.js";
import { hasRole } from "../auth/roles.js";
import { ApiError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { assetRoutes } from "./routes/assets.js";
import { authRoutes } from "./routes/auth.js";
import { bulkRoutes } from "./routes/bulk.js";
import { clientRoutes } from "./routes/clients.js";
import { userRoutes } from "./routes/users.js";
import { workOrderRoutes } from "./routes/work-orders.js";
import { errorResponse, fail, zodDetails } from "./respond.js";
import type { ApiRequest, ApiResponse, Route, RouteContext } from "./types.js";
import { getHeader, isIpAllowed, normalizeRemoteIp } from "./utils.js";

const log = createLogger("http");

export const ROUTES: Route[] = [
  ...authRoutes,
  ...userRoutes,
  ...clientRoutes,
  ...assetRoutes,
  ...workOrderRoutes,
  ...bulkRoutes,
];

export interface ApiServerOptions {
  app: App;
  /** Bind a socket (default true). Without one only `request()` reaches the handler. */
  listen?: boolean;
}

export interface InProcessRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  remoteIp?: string;
}

export interface ApiServer {
  baseUrl: string;
  /** Stop listening, drain the bulk queue, close the database. */
  stop: () => Promise<void>;
  /**
   * In-process request helper for environments that can't bind to network ports.
   * Acts like a minimal `fetch()` against this server instance.
   */
  request: (path: string, init?: InProcessRequestInit) => Promise<Response>;
}

interface RouteMatch {
  route: Route;
  params: Record<string, string>;
}

function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

function matchRoute(routes: Route[], method: string, pathname: string): RouteMatch | null {
  const parts = pathname.split("/").filter(Boolean);
  for (const route of routes) {
    if (route.method !== method) continue;
    const pattern = route.path.split("/").filter(Boolean);
    if (pattern.length !== parts.length) continue;
    const params: Record<string, string> = {};
    const matched = pattern.every((segment, i) => {
      if (segment.startsWith(":")) {
        const decoded = safeDecode(parts[i]);
        if (decoded === null) return false;
        params[segment.slice(1)] = decoded;
        return true;
      }
      return segment === parts[i];
    });
    if (matched) return { route, params };
  }
  return null;
}

async function readBodyBuffer(body: AsyncIterable<unknown>, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of body) {
    const buf =
      typeof chunk === "string"
        ? Buffer.from(chunk, "utf8")
        : chunk instanceof Uint8Array
          ? Buffer.from(chunk)
          : Buffer.from(String(chunk), "utf8");
    total += buf.length;
    if (total > limit) {
      throw new ApiError(413, "ERR_PAYLOAD_TOO_LARGE", `Body exceeds ${limit} bytes`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

function corsHeaders(origins: string[], origin: string | undefined): Record<string, string> {
  if (!origin || origins.length === 0) return {};
  if (!origins.includes("*") && !origins.includes(origin)) return {};
  return {
    "access-control-allow-origin": origins.includes("*") ? "*" : origin,
    "access-control-allow-methods": "GET, POST, PATCH, DELETE, OPTIONS",
    "access-control-allow-headers": "authorization, content-type",
    vary: "origin",
  };
}

function buildContext(app: App, req: ApiRequest, url: URL, params: Record<string, string>): RouteContext {
  let bodyPromise: Promise<Buffer> | null = null;
  const readBody = (limit = app.config.http.maxBodyBytes) => {
    bodyPromise ??= readBodyBuffer(req.body, limit);
    return bodyPromise;
  };

  return {
    app,
    url,
    params,
    headers: req.headers,
    remoteIp: req.remoteIp,
    readBody,
    async readJson(schema) {
      const raw = (await readBody()).toString("utf8");
      let parsed: unknown = {};
      if (raw.trim()) {
        try {
          parsed = JSON.parse(raw);
        } catch {
          throw new ApiError(400, "ERR_INVALID_REQUEST", "Malformed JSON body");
        }
      }
      return schema.parse(parsed);
    },
    query(schema) {
      const result = schema.safeParse(Object.fromEntries(url.searchParams));
      if (!result.success) {
        throw new ApiError(400, "ERR_VALIDATION", "Invalid query", zodDetails(result.error));
      }
      return result.data;
    },
  };
}

async function dispatch(app: App, routes: Route[], req: ApiRequest, url: URL): Promise<ApiResponse> {
  const match = matchRoute(routes, req.method, url.pathname);
  if (!match) {
    return fail(404, "ERR_NOT_FOUND", "Not Found");
  }

  const ctx = buildContext(app, req, url, match.params);
  const { route } = match;
  if (route.auth === "public") {
    return await route.handle(ctx);
  }

  const auth = app.auth.authenticate(getHeader(req.headers, "authorization"), app.now());
  if (!auth.ok) {
    return fail(auth.status, auth.code, auth.message);
  }
  if (!hasRole(auth.user.role, route.auth)) {
    return fail(403, "ERR_FORBIDDEN", `Requires ${route.auth} role`);
  }
  return await route.handle({ ...ctx, user: auth.user, tokenHash: auth.tokenHash });
}

/** Request handler over the route table. Never rejects. */
export function createApiHandler(app: App, routes: Route[] = ROUTES) {
  const { http: config } = app.config;

  return async (req: ApiRequest): Promise<ApiResponse> => {
    const started = Date.now();
    const url = new URL(req.url, "http://localhost");
    const method = req.method.toUpperCase();
    const cors = corsHeaders(config.corsOrigins, getHeader(req.headers, "origin"));

    let response: ApiResponse;
    if (config.allowlist.length > 0 && !isIpAllowed(req.remoteIp, config.allowlist)) {
      response = fail(403, "ERR_FORBIDDEN", "IP not allowed");
    } else if (method === "OPTIONS") {
      response = { status: 204, headers: {}, body: "" };
    } else {
      try {
        response = await dispatch(app, routes, { ...req, method }, url);
      } catch (err) {
        response = errorResponse(err, `${method} ${url.pathname}`);
      }
    }

    response.headers = { ...response.headers, ...cors };
    log.info(`${method} ${url.pathname} ${response.status} ${Date.now() - started}ms`);
    return response;
  };
}

/**
 * Start the API server for an assembled app.
 */
export async function startApiServer(opts: ApiServerOptions): Promise<ApiServer> {
  const { app } = opts;
  const config = app.config.http;
  const handler = createApiHandler(app);

  const server = http.createServer((req, res) => {
    void handler({
      method: req.method ?? "GET",
      url: req.url ?? "/",
      headers: req.headers,
      remoteIp: normalizeRemoteIp(req.socket.remoteAddress),
      body: req,
    })
      .then((out) => {
        res.writeHead(out.status, out.headers);
        res.end(out.body);
      })
      .catch((err: unknown) => {
        log.error("Failed to write response:", err);
        res.destroy();
      });
  });

  let listening = opts.listen ?? true;
  if (listening) {
    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: unknown) => {
          reject(err);
        };
        server.once("error", onError);
        server.listen(config.port, config.host, () => {
          server.off("error", onError);
          resolve();
        });
      });
    } catch (err) {
      // Some CI/sandbox environments disallow binding to loopback/ports.
      // Keep the server usable via `request()` without a listening socket.
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code === "EPERM" || code === "EACCES") {
        log.warn(`Cannot listen on ${config.host}:${config.port} (${code}); in-process requests only`);
        listening = false;
      } else {
        throw err;
      }
    }
  }

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : config.port;
  if (listening) {
    log.info(`API listening on http://${config.host}:${port}`);
  }

  const request: ApiServer["request"] = async (path, init = {}) => {
    const body = init.body ?? "";
    const headers: http.IncomingHttpHeaders = {};
    for (const [k, v] of Object.entries(init.headers ?? {})) {
      headers[k.toLowerCase()] = v;
    }
    const out = await handler({
      method: (init.method ?? "GET").toUpperCase(),
      url: path,
      headers,
      remoteIp: init.remoteIp ?? "127.0.0.1",
      body: Readable.from(body ? [Buffer.from(body, "utf8")] : []),
    });
    return new Response(out.status === 204 ? null : out.body, {
      status: out.status,
      headers: out.headers,
    });
  };

  return {
    baseUrl: listening ? `http://${config.host}:${port}` : "http://in-memory",
    async stop() {
      if (listening) {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
      }
      await app.close();
    },
    request,
  };
}
