import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { configureWifi } from "../schemas/wifi.ts";
import { NotFoundError } from "../middleware/error-handler.ts";
import type { Services } from "../services/index.ts";
import { successBody } from "./helpers.ts";

export function wifiRoutes(services: Services) {
  const app = new Hono();
  const { accessPoint } = services;

  // GET /api/wifi/status
  app.get("/status", async (c) => {
    return c.json(await accessPoint.getStatus());
  });

  // GET /api/wifi/config
  app.get("/config", async (c) => {
    const config = await accessPoint.getConfig();
    if (!config) throw new NotFoundError("WiFi AP not configured");
    return c.json({ config });
  });

  // GET /api/wifi/clients
  app.get("/clients", async (c) => {
    return c.json({ clients: await accessPoint.getConnectedClients() });
  });

  // POST /api/wifi/configure
  app.post("/configure", zValidator("json", configureWifi), async (c) => {
    const { ssid, password, channel, ipAddress } = c.req.valid("json");
    const result = await accessPoint.configure(ssid, password, channel, ipAddress);
    return c.json(successBody(result, `WiFi AP configured: ${ssid} on channel ${channel}`));
  });

  // POST /api/wifi/enable
  app.post("/enable", async (c) => {
    return c.json(successBody(await accessPoint.enable(), "WiFi AP enabled"));
  });

  // POST /api/wifi/disable
  app.post("/disable", async (c) => {
    return c.json(successBody(await accessPoint.disable(), "WiFi AP disabled"));
  });

  // POST /api/wifi/restart
  app.post("/restart", async (c) => {
    return c.json(successBody(await accessPoint.restart(), "WiFi AP restarted"));
  });

  return app;
}
