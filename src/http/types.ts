import type { IncomingHttpHeaders } from "node:http";
import type { z } from "zod";
import type { App } from "../app.js";
import type { UserRole } from "../store/types.js";
import type { UserRecord } from "../store/users.js";

/** Transport-independent request, built from a node:http message or by `request()`. */
export interface ApiRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  remoteIp: string;
  body: AsyncIterable<unknown>;
}

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface RouteContext {
  app: App;
  url: URL;
  params: Record<string, string>;
  headers: IncomingHttpHeaders;
  remoteIp: string;
  /** Raw body, rejected with 413 past `limit` bytes (default `http.maxBodyBytes`) */
  readBody(limit?: number): Promise<Buffer>;
  /** JSON body validated by `schema`; an empty body parses as `{}` */
  readJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
  query<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
}

export interface AuthedContext extends RouteContext {
  user: UserRecord;
  tokenHash: string;
}

type Handler<C> = (ctx: C) => Promise<ApiResponse> | ApiResponse;

export type Route =
  | { method: HttpMethod; path: string; auth: "public"; handle: Handler<RouteContext> }
  | { method: HttpMethod; path: string; auth: UserRole; handle: Handler<AuthedContext> };

export function publicRoute(method: HttpMethod, path: string, handle: Handler<RouteContext>): Route {
  return { method, path, auth: "public", handle };
}

/** Route that needs a bearer token of a user with at least `minimum` role. */
export function authedRoute(
  method: HttpMethod,
  path: string,
  minimum: UserRole,
  handle: Handler<AuthedContext>
): Route {
  return { method, path, auth: minimum, handle };
}
