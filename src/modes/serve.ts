import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { loadConfig, resolveConfigPath } from "../config.ts";
import { initDb, closeDb } from "../db/index.ts";
import { authMiddleware } from "../middleware/auth.ts";
import { errorHandler } from "../middleware/error-handler.ts";
import { auditLogger } from "../middleware/logger.ts";
import { adapterRoutes } from "../routes/adapters.ts";
import { dhcpRoutes } from "../routes/dhcp.ts";
import { systemRoutes } from "../routes/system.ts";
import { wifiRoutes } from "../routes/wifi.ts";
import { createServices } from "../services/index.ts";
import type { Services } from "../services/index.ts";
import { createLogger, setLogLevel } from "../utils/logger.ts";

const log = createLogger("server");

export async function startServer(configPath?: string): Promise<void> {
  const config = await loadConfig(configPath);
  setLogLevel(config.logLevel);
  initDb(config.dbPath);

  const services = createServices(config, { configPath: resolveConfigPath(configPath) });
  const app = createApp(services);

  serve({ fetch: app.fetch, port: config.listen.port, hostname: config.listen.host }, (info) => {
    log.info(`LAN Manager running at http://${info.address}:${info.port}`);
  });
  log.info(`API key: ${config.apiKey}`);

  // Graceful shutdown
  process.on("SIGINT", () => {
    log.info("Shutting down...");
    closeDb();
    process.exit(0);
  });

  process.on("SIGTERM", () => {
    closeDb();
    process.exit(0);
  });
}

export function createApp(services: Services): Hono {
  const app = new Hono();

  // Global error handler
  app.onError(errorHandler);

  // Health check (no auth)
  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Auth + audit for all /api routes
  app.use("/api/*", authMiddleware(services.config));
  app.use("/api/*", auditLogger());

  // Mount routes
  app.route("/api/adapters", adapterRoutes(services));
  app.route("/api/wifi", wifiRoutes(services));
  app.route("/api/dhcp", dhcpRoutes(services));
  app.route("/api/system", systemRoutes(services));

  // 404 fallback
  app.notFound((c) => {
    return c.json({ error: "NotFound", message: "Route not found" }, 404);
  });

  return app;
}
