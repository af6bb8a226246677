import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AppConfig } from "../config.ts";
import type { OperationResult } from "../types/index.ts";
import type { CommandRunner } from "../utils/shell.ts";
import { failed, succeeded } from "../utils/result.ts";
import { createLogger } from "../utils/logger.ts";
import { SystemdUnit, daemonReload } from "./systemd.ts";

const log = createLogger("boot-unit");

/** Time nmcli may spend on a single activation before giving up. */
const ACTIVATION_ALLOWANCE_MS = 30_000;

export const WAIT_ONLINE_UNIT = "NetworkManager-wait-online.service";

/** Upper bound for one `boot-ap` run: three readiness polls, the settle delay and every activation attempt. */
export function bootTimeoutSeconds(timing: AppConfig["timing"]): number {
  const totalMs =
    3 * timing.readinessTimeoutMs +
    timing.firmwareSettleMs +
    timing.activationAttempts * (timing.activationRetryDelayMs + ACTIVATION_ALLOWANCE_MS);
  return Math.ceil(totalMs / 1000);
}

export function renderBootUnit(config: AppConfig, configPath: string): string {
  const { systemd, timing } = config;
  return `[Unit]
Description=LAN Manager WiFi AP Activation
After=NetworkManager.service network-online.target
Wants=NetworkManager.service network-online.target

[Service]
Type=oneshot
ExecStart=${systemd.binaryPath} boot-ap --config ${configPath}
RemainAfterExit=yes
TimeoutStartSec=${bootTimeoutSeconds(timing)}

[Install]
WantedBy=multi-user.target
`;
}

/** The oneshot unit that runs the boot activation sequence for the access point. */
export class BootUnitInstaller {
  readonly unit: SystemdUnit;
  readonly unitPath: string;

  constructor(
    private readonly config: AppConfig,
    private readonly configPath: string,
    private readonly runner: CommandRunner,
  ) {
    this.unit = new SystemdUnit(config.accessPoint.bootUnit, runner);
    this.unitPath = join(config.systemd.unitDir, config.accessPoint.bootUnit);
  }

  /** Writes and enables the unit. If enabling fails the unit file is removed again. */
  async install(): Promise<OperationResult> {
    try {
      await mkdir(this.config.systemd.unitDir, { recursive: true });
      await writeFile(this.unitPath, renderBootUnit(this.config, this.configPath));
    } catch (err) {
      return failed("command", `Error installing ${this.unitPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    log.info(`Installed boot unit: ${this.unitPath}`);

    const reload = await daemonReload(this.runner);
    const enable = reload.ok ? await this.unit.enable() : reload;
    if (!enable.ok) {
      await rm(this.unitPath, { force: true });
      await daemonReload(this.runner);
      return failed("command", `Failed to enable ${this.unit.name}: ${enable.stderr}`);
    }

    // network-online.target is never reached without it, so the unit would not start on boot
    const waitOnline = await new SystemdUnit(WAIT_ONLINE_UNIT, this.runner).enable();
    if (!waitOnline.ok) {
      return succeeded(`Could not enable ${WAIT_ONLINE_UNIT}: ${waitOnline.stderr}`);
    }
    return succeeded();
  }

  async uninstall(): Promise<void> {
    await this.unit.stop();
    await this.unit.disable();
    await rm(this.unitPath, { force: true });
    await daemonReload(this.runner);
  }

  /** Stops, disables and deletes units left by earlier releases. */
  async removeLegacyUnits(): Promise<void> {
    for (const name of this.config.accessPoint.legacyUnits) {
      const legacy = new SystemdUnit(name, this.runner);
      const path = join(this.config.systemd.unitDir, name);
      await legacy.stop();
      await legacy.disable();
      await rm(path, { force: true });
    }
    if (this.config.accessPoint.legacyUnits.length > 0) {
      await daemonReload(this.runner);
    }
  }
}
