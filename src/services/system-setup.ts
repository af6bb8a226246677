import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { AppConfig } from "../config.ts";
import type { OperationResult } from "../types/index.ts";
import type { CommandRunner } from "../utils/shell.ts";
import { exec, systemRunner } from "../utils/shell.ts";
import type { AccessPointController } from "./access-point.ts";

const REQUIRED_COMMANDS = ["nmcli", "dnsmasq", "systemctl", "ip", "rfkill"] as const;
const PACKAGES = ["dnsmasq", "network-manager", "rfkill", "iproute2"];

export const DNSMASQ_ORDERING_FILE = "wait-for-network.conf";

/** Command name -> found on PATH. */
export type DependencyReport = Record<string, boolean>;

/** dnsmasq must not start before NetworkManager has brought the adapters up. */
export const DNSMASQ_ORDERING = `[Unit]
After=NetworkManager.service network-online.target
Wants=network-online.target
`;

export function renderApiUnit(config: AppConfig, configPath: string): string {
  return `[Unit]
Description=LAN Manager API
After=network.target NetworkManager.service

[Service]
Type=simple
ExecStart=${config.systemd.binaryPath} serve --config ${configPath}
Restart=on-failure
RestartSec=5
User=root

[Install]
WantedBy=multi-user.target
`;
}

/** Brings up the static profiles of adapters plugged in before boot. */
export function renderAdapterUnit(config: AppConfig, configPath: string): string {
  return `[Unit]
Description=LAN Manager USB adapter activation
After=NetworkManager.service
Wants=NetworkManager.service

[Service]
Type=oneshot
ExecStart=${config.systemd.binaryPath} boot-adapters --config ${configPath}
RemainAfterExit=yes

[Install]
WantedBy=multi-user.target
`;
}

/** One-time host preparation run by `lan-manager setup`. */
export class SystemSetupService {
  constructor(
    private readonly config: AppConfig,
    private readonly configPath: string,
    private readonly accessPoint: AccessPointController,
    private readonly runner: CommandRunner = systemRunner,
  ) {}

  async checkDependencies(): Promise<DependencyReport> {
    const report: DependencyReport = {};
    for (const cmd of REQUIRED_COMMANDS) {
      const result = await this.runner.run(["which", cmd], { quiet: true });
      report[cmd] = result.ok;
    }
    return report;
  }

  async installDependencies(): Promise<void> {
    await exec(["apt-get", "update", "-qq"], this.runner);
    await exec(["apt-get", "install", "-y", ...PACKAGES], this.runner);
  }

  /** Writes the default configuration unless a file is already there. Returns whether it wrote one. */
  async createConfigDirectory(): Promise<boolean> {
    await mkdir(dirname(this.configPath), { recursive: true });
    if (existsSync(this.configPath)) return false;
    await writeFile(this.configPath, JSON.stringify(this.config, null, 2) + "\n");
    return true;
  }

  async installDnsmasqOrdering(): Promise<string> {
    const path = join(this.config.dnsmasq.dropInDir, DNSMASQ_ORDERING_FILE);
    await mkdir(this.config.dnsmasq.dropInDir, { recursive: true });
    await writeFile(path, DNSMASQ_ORDERING);
    await exec(["systemctl", "daemon-reload"], this.runner);
    return path;
  }

  async seedDhcpExclusion(): Promise<OperationResult> {
    return this.accessPoint.enforceDhcpExclusion();
  }

  async installSystemdService(): Promise<string> {
    return this.installUnit(this.config.systemd.apiUnit, renderApiUnit(this.config, this.configPath));
  }

  async installAdapterBootUnit(): Promise<string> {
    return this.installUnit(this.config.systemd.adapterUnit, renderAdapterUnit(this.config, this.configPath));
  }

  private async installUnit(name: string, content: string): Promise<string> {
    const { unitDir } = this.config.systemd;
    const path = join(unitDir, name);
    await mkdir(unitDir, { recursive: true });
    await writeFile(path, content);
    await exec(["systemctl", "daemon-reload"], this.runner);
    await exec(["systemctl", "enable", name], this.runner);
    return path;
  }
}
