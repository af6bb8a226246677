import { createMiddleware } from "hono/factory";
import { getDb } from "../db/index.ts";
import { insertAuditLog } from "../db/schema.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("http");

const MUTATING_METHODS = ["POST", "PUT", "DELETE", "PATCH"];

export function auditLogger() {
  return createMiddleware(async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    const ip = c.req.header("x-forwarded-for") || c.req.header("x-real-ip") || "unknown";

    log.info(`${method} ${path} ${status} ${duration}ms`);

    if (MUTATING_METHODS.includes(method)) {
      try {
        insertAuditLog(getDb(), {
          action: method,
          resource: path,
          resource_id: null,
          details: JSON.stringify({ status, duration }),
          ip_address: ip,
          success: status < 400 ? 1 : 0,
        });
      } catch (err) {
        log.error(`Audit log write failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  });
}
