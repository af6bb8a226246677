import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import { macAddress } from "../schemas/common.ts";
import { addReservation } from "../schemas/reservations.ts";
import { NotFoundError } from "../middleware/error-handler.ts";
import type { Services } from "../services/index.ts";
import { successBody } from "./helpers.ts";

const macParam = z.object({ mac: macAddress });

export function dhcpRoutes(services: Services) {
  const app = new Hono();
  const { dnsmasq } = services;

  // GET /api/dhcp/reservations
  app.get("/reservations", async (c) => {
    const { reservations, invalid } = await dnsmasq.listReservations();
    return c.json({ reservations, invalid });
  });

  // POST /api/dhcp/reservations
  app.post("/reservations", zValidator("json", addReservation), async (c) => {
    const body = c.req.valid("json");
    const result = await dnsmasq.upsertReservation(body);
    return c.json(successBody(result, `Reservation added: ${body.macAddress} -> ${body.ipAddress}`), 201);
  });

  // DELETE /api/dhcp/reservations/:mac
  app.delete("/reservations/:mac", zValidator("param", macParam), async (c) => {
    const { mac } = c.req.valid("param");
    if (!(await dnsmasq.hasReservation(mac))) {
      throw new NotFoundError(`No reservation for ${mac}`);
    }
    const result = await dnsmasq.removeReservation(mac);
    return c.json(successBody(result, `Reservation removed: ${mac}`));
  });

  return app;
}
