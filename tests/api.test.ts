import { test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import type { Hono } from "hono";
import { parseConfig } from "../src/config.ts";
import { closeDb, setDb } from "../src/db/index.ts";
import { initSchema, recentAuditLogs } from "../src/db/schema.ts";
import { createApp } from "../src/modes/serve.ts";
import { createServices } from "../src/services/index.ts";
import { FakeClock, FakeSystem } from "./helpers/fake-system.ts";

let dir: string;
let db: Database.Database;
let system: FakeSystem;
let app: Hono;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "lan-manager-api-"));
  db = new Database(":memory:");
  initSchema(db);
  setDb(db);

  system = new FakeSystem();
  const config = parseConfig({
    apiKey: "test-api-key",
    dnsmasq: { configPath: join(dir, "dnsmasq.conf") },
    systemd: { unitDir: join(dir, "units") },
  });
  const services = createServices(config, {
    runner: system,
    clock: new FakeClock(),
    configPath: join(dir, "config.json"),
    sysfsRoot: join(dir, "sys"),
  });
  app = createApp(services);
});

afterEach(async () => {
  closeDb();
  await rm(dir, { recursive: true, force: true });
});

function req(path: string, opts?: RequestInit & { noAuth?: boolean }) {
  const headers = new Headers(opts?.headers);
  if (!opts?.noAuth) {
    headers.set("X-API-Key", "test-api-key");
  }
  return app.request(path, { ...opts, headers });
}

function post(path: string, body?: unknown) {
  return req(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function json(res: Response): Promise<unknown> {
  return res.json();
}

// ---- Health ----
test("GET /health returns ok", async () => {
  const res = await app.request("/health");
  expect(res.status).toBe(200);
  expect(await json(res)).toMatchObject({ status: "ok" });
});

// ---- Auth ----
test("API routes require auth", async () => {
  const res = await req("/api/wifi/status", { noAuth: true });
  expect(res.status).toBe(401);
  expect(await json(res)).toEqual({ error: "Unauthorized", message: "Invalid or missing API key" });
});

test("API routes reject wrong key", async () => {
  const res = await app.request("/api/wifi/status", { headers: { "X-API-Key": "wrong-key" } });
  expect(res.status).toBe(401);
});

test("API routes accept the key as a bearer token", async () => {
  const res = await app.request("/api/wifi/status", { headers: { Authorization: "Bearer test-api-key" } });
  expect(res.status).toBe(200);
});

// ---- WiFi ----
test("GET /api/wifi/status on a fresh host", async () => {
  const res = await req("/api/wifi/status");
  expect(res.status).toBe(200);
  expect(await json(res)).toEqual({ installed: false, enabled: false, active: false, config: null, clients: [] });
});

test("GET /api/wifi/config is 404 before configure", async () => {
  const res = await req("/api/wifi/config");
  expect(res.status).toBe(404);
  expect(await json(res)).toEqual({ error: "NotFoundError", message: "WiFi AP not configured" });
});

test("configure and enable through the API", async () => {
  const configured = await post("/api/wifi/configure", { ssid: "HomeAP", password: "password1" });
  expect(configured.status).toBe(200);
  expect(await json(configured)).toEqual({ success: true, message: "WiFi AP configured: HomeAP on channel 6" });

  const enabled = await post("/api/wifi/enable");
  expect(enabled.status).toBe(200);
  expect(await json(enabled)).toEqual({ success: true, message: "WiFi AP enabled" });

  const status = await req("/api/wifi/status");
  expect(await json(status)).toEqual({
    installed: true,
    enabled: true,
    active: true,
    config: { ssid: "HomeAP", channel: 6, interface: "wlan0", ipAddress: "10.0.2.1" },
    clients: [],
  });
});

test("POST /api/wifi/configure validates the body", async () => {
  const res = await post("/api/wifi/configure", { ssid: "HomeAP", password: "short" });
  expect(res.status).toBe(400);
  expect(system.calls).toEqual([]);
});

test("POST /api/wifi/enable before configure is a conflict", async () => {
  const res = await post("/api/wifi/enable");
  expect(res.status).toBe(409);
  expect(await json(res)).toEqual({ error: "ConflictError", message: "WiFi AP not configured - run configure first" });
});

test("POST /api/wifi/enable reports a readiness timeout as 503", async () => {
  await post("/api/wifi/configure", { ssid: "HomeAP", password: "password1" });
  system.devices.set("wlan0", "unavailable");

  const res = await post("/api/wifi/enable");
  expect(res.status).toBe(503);
  expect(await json(res)).toEqual({ error: "ReadinessError", message: "wlan0 did not become ready" });
});

test("POST /api/wifi/restart maps a failed activation to 500", async () => {
  await post("/api/wifi/configure", { ssid: "HomeAP", password: "password1" });
  system.failNext("nmcli connection up lan-manager-ap");

  const res = await post("/api/wifi/restart");
  expect(res.status).toBe(500);
  expect(await json(res)).toEqual({ error: "ServiceError", message: "Failed to restart WiFi AP: simulated failure" });
});

// ---- DHCP reservations ----
test("reservations can be added, listed and removed", async () => {
  const added = await post("/api/dhcp/reservations", {
    macAddress: "AA:BB:CC:DD:EE:FF",
    ipAddress: "10.0.0.10",
    hostname: "printer",
  });
  expect(added.status).toBe(201);
  expect(await json(added)).toEqual({ success: true, message: "Reservation added: aa:bb:cc:dd:ee:ff -> 10.0.0.10" });

  const listed = await req("/api/dhcp/reservations");
  expect(await json(listed)).toEqual({
    reservations: [{ macAddress: "aa:bb:cc:dd:ee:ff", ipAddress: "10.0.0.10", hostname: "printer" }],
    invalid: [],
  });

  const removed = await req("/api/dhcp/reservations/aa:bb:cc:dd:ee:ff", { method: "DELETE" });
  expect(removed.status).toBe(200);
  expect(await json(removed)).toEqual({ success: true, message: "Reservation removed: aa:bb:cc:dd:ee:ff" });

  const again = await req("/api/dhcp/reservations/aa:bb:cc:dd:ee:ff", { method: "DELETE" });
  expect(again.status).toBe(404);
});

test("a malformed reservation line can still be removed by MAC", async () => {
  const dnsmasqPath = join(dir, "dnsmasq.conf");
  await writeFile(dnsmasqPath, "dhcp-host=aa:bb:cc:dd:ee:01\n");

  const listed = await req("/api/dhcp/reservations");
  expect(await json(listed)).toEqual({
    reservations: [],
    invalid: [{ line: "dhcp-host=aa:bb:cc:dd:ee:01", reason: "expected 2 or 3 fields, found 1" }],
  });

  const removed = await req("/api/dhcp/reservations/aa:bb:cc:dd:ee:01", { method: "DELETE" });
  expect(removed.status).toBe(200);
  expect(await json(removed)).toEqual({ success: true, message: "Reservation removed: aa:bb:cc:dd:ee:01" });
  expect(await readFile(dnsmasqPath, "utf8")).toBe("");
});

test("reservations with a bad MAC are rejected", async () => {
  const res = await post("/api/dhcp/reservations", { macAddress: "aa:bb:cc", ipAddress: "10.0.0.10" });
  expect(res.status).toBe(400);

  const del = await req("/api/dhcp/reservations/not-a-mac", { method: "DELETE" });
  expect(del.status).toBe(400);
});

// ---- Adapters ----
test("POST /api/adapters/:iface/configure assigns the address", async () => {
  const res = await post("/api/adapters/eth1/configure", { ipAddress: "10.0.1.1" });
  expect(res.status).toBe(200);
  expect(await json(res)).toEqual({ success: true, message: "Configured eth1 with IP 10.0.1.1/24" });
  expect(system.active.has("eth1-static")).toBe(true);
});

test("POST /api/adapters/:iface/configure returns DHCP warnings", async () => {
  system.failNext("systemctl restart dnsmasq", 1, "unit dnsmasq.service not found");

  const res = await post("/api/adapters/eth1/configure", { ipAddress: "10.0.1.1", prefix: 24 });
  expect(res.status).toBe(200);
  expect(await json(res)).toEqual({
    success: true,
    message: "Configured eth1 with IP 10.0.1.1/24",
    warnings: [
      "Network configured but DHCP not applied for eth1",
      "Configuration saved but dnsmasq restart failed: unit dnsmasq.service not found",
    ],
  });
});

test("the WiFi interface cannot be configured as an adapter", async () => {
  const res = await post("/api/adapters/wlan0/configure", { ipAddress: "10.0.1.1" });
  expect(res.status).toBe(400);
  expect(await json(res)).toEqual({ error: "ValidationError", message: "wlan0 is reserved for the WiFi access point" });
});

test("GET /api/adapters/usb lists discovered adapters", async () => {
  system.addresses = [
    { ifname: "lo", flags: ["UP"], link_type: "loopback", addr_info: [] },
    { ifname: "eth1", flags: ["UP"], link_type: "ether", address: "00:e0:4c:00:00:02", addr_info: [] },
  ];
  const res = await req("/api/adapters/usb");
  expect(res.status).toBe(200);
  expect(await json(res)).toEqual({
    adapters: [
      {
        name: "eth1",
        kind: "wired",
        up: true,
        linkUp: false,
        macAddress: "00:e0:4c:00:00:02",
        ipAddress: null,
        prefix: null,
        driver: null,
      },
    ],
  });
});

test("GET /api/adapters tolerates truncated ip output", async () => {
  system.addresses = '[{"ifname":"eth1",';

  const res = await req("/api/adapters");
  expect(res.status).toBe(200);
  expect(await json(res)).toEqual({ adapters: [] });
});

// ---- System ----
test("GET /api/system/status summarises services and counts", async () => {
  system.unit("NetworkManager").active = true;
  await post("/api/dhcp/reservations", { macAddress: "aa:bb:cc:dd:ee:01", ipAddress: "10.0.0.10" });

  const res = await req("/api/system/status");
  expect(await json(res)).toEqual({ dnsmasq: true, networkManager: true, adaptersCount: 0, reservationsCount: 1 });
});

test("mutating requests are written to the audit log", async () => {
  await post("/api/dhcp/reservations", { macAddress: "aa:bb:cc:dd:ee:01", ipAddress: "10.0.0.10" });
  await post("/api/adapters/wlan0/configure", { ipAddress: "10.0.1.1" });
  await req("/api/wifi/status");

  const entries = recentAuditLogs(db, 10);
  expect(entries.map((entry) => [entry.action, entry.resource, entry.success])).toEqual([
    ["POST", "/api/adapters/wlan0/configure", 0],
    ["POST", "/api/dhcp/reservations", 1],
  ]);

  const res = await req("/api/system/audit?limit=1");
  expect(await json(res)).toMatchObject({ entries: [{ action: "POST", resource: "/api/adapters/wlan0/configure" }] });
});

// ---- 404 ----
test("unknown route returns 404", async () => {
  const res = await app.request("/nonexistent");
  expect(res.status).toBe(404);
  expect(await json(res)).toEqual({ error: "NotFound", message: "Route not found" });
});

// ---- DB Schema ----
test("schema creates the audit table", () => {
  const tables = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all();
  expect(tables.map((t) => t.name)).toContain("audit_log");
});
