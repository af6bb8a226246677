import { randomUUID } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";

const DEFAULT_CONFIG_PATH = "/etc/lan-manager/config.json";

const listenSchema = z
  .object({
    host: z.string().default("0.0.0.0"),
    port: z.number().int().min(0).max(65535).default(8080),
  })
  .default({});

const dnsmasqSchema = z
  .object({
    configPath: z.string().default("/etc/dnsmasq.conf"),
    serviceName: z.string().default("dnsmasq"),
    dropInDir: z.string().default("/etc/systemd/system/dnsmasq.service.d"),
  })
  .default({});

const dhcpSchema = z
  .object({
    leaseTime: z.string().default("24h"),
    rangeStartHost: z.number().int().min(1).max(254).default(10),
    rangeEndHost: z.number().int().min(1).max(254).default(50),
    dnsServers: z.array(z.string()).default(["8.8.8.8", "8.8.4.4"]),
    replaceScopeOnReassign: z.boolean().default(false),
  })
  .default({});

const adaptersSchema = z
  .object({
    builtinInterface: z.string().default("eth0"),
    markerPurpose: z.string().default("USB Ethernet Adapter"),
  })
  .default({});

const accessPointSchema = z
  .object({
    interface: z.string().default("wlan0"),
    connectionName: z.string().default("lan-manager-ap"),
    defaultSsid: z.string().default("LAN-Manager-AP"),
    defaultChannel: z.number().int().min(1).max(11).default(6),
    defaultAddress: z.string().default("10.0.2.1"),
    bootUnit: z.string().default("lan-manager-ap.service"),
    legacyUnits: z.array(z.string()).default(["wifi-ap-delayed-start.service"]),
  })
  .default({});

const systemdSchema = z
  .object({
    unitDir: z.string().default("/etc/systemd/system"),
    apiUnit: z.string().default("lan-manager.service"),
    adapterUnit: z.string().default("lan-manager-adapters.service"),
    binaryPath: z.string().default("/usr/local/bin/lan-manager"),
  })
  .default({});

const timingSchema = z
  .object({
    cacheTtlMs: z.number().int().min(0).default(5_000),
    enablePollAttempts: z.number().int().min(1).default(10),
    enablePollIntervalMs: z.number().int().min(0).default(1_000),
    readinessTimeoutMs: z.number().int().min(0).default(60_000),
    readinessIntervalMs: z.number().int().min(1).default(3_000),
    firmwareSettleMs: z.number().int().min(0).default(5_000),
    activationAttempts: z.number().int().min(1).default(3),
    activationRetryDelayMs: z.number().int().min(0).default(5_000),
    restartSettleMs: z.number().int().min(0).default(2_000),
  })
  .default({});

export const appConfigSchema = z.object({
  listen: listenSchema,
  apiKey: z.string().default(""),
  dbPath: z.string().default("/etc/lan-manager/lan-manager.db"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  dnsmasq: dnsmasqSchema,
  dhcp: dhcpSchema,
  adapters: adaptersSchema,
  accessPoint: accessPointSchema,
  systemd: systemdSchema,
  timing: timingSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export function resolveConfigPath(override?: string): string {
  if (override) return override;
  if (process.env.LAN_MANAGER_CONFIG) {
    return process.env.LAN_MANAGER_CONFIG;
  }
  return DEFAULT_CONFIG_PATH;
}

export function configExists(overridePath?: string): boolean {
  return existsSync(resolveConfigPath(overridePath));
}

/** Build a config from a partial object, filling every default. */
export function parseConfig(input: unknown): AppConfig {
  return appConfigSchema.parse(input ?? {});
}

export async function loadConfig(overridePath?: string): Promise<AppConfig> {
  const configPath = resolveConfigPath(overridePath);
  let fileConfig: unknown = {};

  if (existsSync(configPath)) {
    fileConfig = JSON.parse(await readFile(configPath, "utf8"));
  } else {
    console.log(`Config file not found at ${configPath}, using defaults`);
  }

  const config = parseConfig(fileConfig);

  // Auto-generate API key if empty
  if (!config.apiKey) {
    config.apiKey = randomUUID();
    console.log(`Generated API key: ${config.apiKey}`);

    try {
      await mkdir(dirname(configPath), { recursive: true });
      await writeFile(configPath, JSON.stringify(config, null, 2) + "\n");
      console.log(`Config written to ${configPath}`);
    } catch (err) {
      console.warn(`Could not write config to ${configPath}, using in-memory config:`, err);
    }
  }

  return config;
}
