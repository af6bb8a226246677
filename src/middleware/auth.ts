import { createMiddleware } from "hono/factory";
import type { AppConfig } from "../types/index.ts";

function presentedKey(header: (name: string) => string | undefined): string | undefined {
  const apiKey = header("X-API-Key");
  if (apiKey) return apiKey;
  const authorization = header("Authorization");
  return authorization?.startsWith("Bearer ") ? authorization.slice("Bearer ".length) : undefined;
}

/** Accepts the key as `X-API-Key` or as a bearer token. */
export function authMiddleware(config: AppConfig) {
  return createMiddleware(async (c, next) => {
    const apiKey = presentedKey((name) => c.req.header(name));
    if (!apiKey || apiKey !== config.apiKey) {
      return c.json({ error: "Unauthorized", message: "Invalid or missing API key" }, 401);
    }
    await next();
  });
}
