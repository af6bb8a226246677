import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { getDb } from "../db/index.ts";
import { recentAuditLogs } from "../db/schema.ts";
import { limitQuery } from "../schemas/common.ts";
import type { Services } from "../services/index.ts";
import type { SystemStatus } from "../types/index.ts";

export function systemRoutes(services: Services) {
  const app = new Hono();

  // GET /api/system/status
  app.get("/status", async (c) => {
    const [dnsmasq, networkManager, adapters, listing] = await Promise.all([
      services.dnsmasq.isServiceActive(),
      services.networkManagerService.isActive(),
      services.adapters.listUsbAdapters(),
      services.dnsmasq.listReservations(),
    ]);

    const status: SystemStatus = {
      dnsmasq,
      networkManager,
      adaptersCount: adapters.length,
      reservationsCount: listing.reservations.length,
    };
    return c.json(status);
  });

  // GET /api/system/audit
  app.get("/audit", zValidator("query", limitQuery), (c) => {
    const { limit } = c.req.valid("query");
    return c.json({ entries: recentAuditLogs(getDb(), limit) });
  });

  return app;
}
