import { loadConfig, resolveConfigPath } from "../config.ts";
import { initDb } from "../db/index.ts";
import { createServices } from "../services/index.ts";
import { SystemSetupService } from "../services/system-setup.ts";
import { setLogLevel } from "../utils/logger.ts";

export async function runSetup(configPath?: string): Promise<void> {
  console.log("LAN Manager - First-Time Setup\n");

  // Check root
  if (process.getuid && process.getuid() !== 0) {
    console.error("Error: Setup must be run as root (sudo lan-manager setup)");
    process.exit(1);
  }

  const path = resolveConfigPath(configPath);
  const config = await loadConfig(configPath);
  setLogLevel(config.logLevel);
  const services = createServices(config, { configPath: path });
  const systemSetup = new SystemSetupService(config, path, services.accessPoint, services.runner);

  // Step 1: Install system dependencies
  console.log("[1/7] Installing system dependencies...");
  await systemSetup.installDependencies();
  const report = await systemSetup.checkDependencies();
  const missing = Object.entries(report)
    .filter(([, found]) => !found)
    .map(([cmd]) => cmd);
  if (missing.length > 0) {
    console.error(`Error: still missing after install: ${missing.join(", ")}`);
    process.exit(1);
  }
  console.log("  Dependencies installed.\n");

  // Step 2: Create config directory + default config
  console.log("[2/7] Creating configuration...");
  const written = await systemSetup.createConfigDirectory();
  console.log(`  Config: ${path}${written ? "" : " (kept existing)"}\n`);

  // Step 3: Initialize database
  console.log("[3/7] Initializing database...");
  initDb(config.dbPath);
  console.log(`  Database: ${config.dbPath}\n`);

  // Step 4: Order dnsmasq after NetworkManager
  console.log("[4/7] Ordering dnsmasq after NetworkManager...");
  console.log(`  Drop-in: ${await systemSetup.installDnsmasqOrdering()}\n`);

  // Step 5: Keep the system dnsmasq off the WiFi interface
  console.log(`[5/7] Excluding ${config.accessPoint.interface} from system dnsmasq...`);
  const exclusion = await systemSetup.seedDhcpExclusion();
  if (!exclusion.ok) {
    console.error(`  Warning: ${exclusion.error}\n`);
  } else {
    for (const warning of exclusion.warnings) console.warn(`  Warning: ${warning}`);
    console.log(`  ${config.dnsmasq.configPath} updated.\n`);
  }

  // Step 6: Install + enable systemd service
  console.log("[6/7] Installing systemd service...");
  await systemSetup.installSystemdService();
  console.log("  Service installed and enabled.\n");

  // Step 7: Activate USB adapter profiles at boot
  console.log("[7/7] Installing USB adapter boot unit...");
  console.log(`  Unit: ${await systemSetup.installAdapterBootUnit()}\n`);

  console.log("Setup complete!");
  console.log(`  API key: ${config.apiKey}`);
  console.log(`  API:     http://${config.listen.host}:${config.listen.port}`);
  console.log("");
  console.log("Next steps:");
  console.log("  1. Configure the WiFi AP:  POST /api/wifi/configure");
  console.log("  2. Enable it on boot:      POST /api/wifi/enable");
  console.log("");
}
