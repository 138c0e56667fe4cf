import { VERSION } from "../../version.js";
import { renderUser } from "../render.js";
import { fail, ok } from "../respond.js";
import { loginSchema } from "../schemas.js";
import { authedRoute, publicRoute, type Route } from "../types.js";

export const authRoutes: Route[] = [
  publicRoute("GET", "/api/health", () =>
    ok({ status: "ok", version: VERSION, uptime: process.uptime() })
  ),

  publicRoute("POST", "/api/auth/login", async (ctx) => {
    const body = await ctx.readJson(loginSchema);
    const result = ctx.app.auth.login(body.email, body.password, ctx.remoteIp, ctx.app.now());
    if (!result.ok) {
      const response = fail(result.status, result.code, result.message);
      if (result.resetAt !== undefined) {
        const seconds = Math.max(1, Math.ceil((result.resetAt - ctx.app.now()) / 1000));
        response.headers["retry-after"] = String(seconds);
      }
      return response;
    }
    return ok({
      token: result.token,
      tokenType: result.tokenType,
      expiresAt: new Date(result.expiresAt).toISOString(),
      user: renderUser(result.user),
    });
  }),

  authedRoute("POST", "/api/auth/logout", "user", (ctx) => {
    ctx.app.auth.logout(ctx.tokenHash, ctx.app.now());
    return ok({ loggedOut: true });
  }),

  authedRoute("GET", "/api/me", "user", (ctx) => ok(renderUser(ctx.user))),
];
