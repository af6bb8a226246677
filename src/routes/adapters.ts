import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { configureAdapter } from "../schemas/adapters.ts";
import type { Services } from "../services/index.ts";
import { successBody } from "./helpers.ts";

export function adapterRoutes(services: Services) {
  const app = new Hono();
  const { adapters } = services;

  // GET /api/adapters
  app.get("/", async (c) => {
    return c.json({ adapters: await adapters.listAdapters() });
  });

  // GET /api/adapters/usb
  app.get("/usb", async (c) => {
    return c.json({ adapters: await adapters.listUsbAdapters() });
  });

  // POST /api/adapters/:iface/configure
  app.post("/:iface/configure", zValidator("json", configureAdapter), async (c) => {
    const iface = c.req.param("iface");
    const { ipAddress, prefix } = c.req.valid("json");
    const result = await adapters.assign(iface, ipAddress, prefix);
    return c.json(successBody(result, `Configured ${iface} with IP ${ipAddress}/${prefix}`));
  });

  return app;
}
