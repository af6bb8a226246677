import type { AppConfig } from "../config.ts";
import type { OperationResult } from "../types/index.ts";
import type { Clock } from "../utils/clock.ts";
import type { PollBounds } from "../utils/poll.ts";
import { pollUntil } from "../utils/poll.ts";
import { failed, succeeded } from "../utils/result.ts";
import { createLogger } from "../utils/logger.ts";
import type { AccessPointController } from "./access-point.ts";
import type { NetworkManagerClient } from "./network-manager.ts";
import type { NetworkService } from "./network.ts";

const log = createLogger("boot-ap");

/**
 * Brings the access point up at boot once the radio, the interface and
 * NetworkManager are actually ready, instead of trusting unit ordering.
 *
 * Runs unattended from the boot unit, so every outcome is returned and
 * logged rather than thrown. Only the final activation is retried.
 */
export class BootActivationSequencer {
  private readonly iface: string;
  private readonly timing: AppConfig["timing"];

  constructor(
    config: AppConfig,
    private readonly ap: AccessPointController,
    private readonly nm: NetworkManagerClient,
    private readonly network: NetworkService,
    private readonly clock: Clock,
  ) {
    this.iface = config.accessPoint.interface;
    this.timing = config.timing;
  }

  private get bounds(): PollBounds {
    return { timeoutMs: this.timing.readinessTimeoutMs, intervalMs: this.timing.readinessIntervalMs };
  }

  async run(): Promise<OperationResult> {
    const warnings: string[] = [];

    const radio = await this.ap.unblockRadio();
    if (!radio.ok) {
      // the interface polls below decide whether this mattered
      log.warn(radio.error);
      warnings.push(radio.error);
    }

    log.info(`Waiting for ${this.iface} to be available...`);
    if (!(await pollUntil(() => this.network.linkExists(this.iface), this.bounds, this.clock))) {
      return this.timeout(`${this.iface} did not appear`);
    }
    log.info(`${this.iface} is available`);

    log.info(`Waiting for ${this.iface} to be ready in NetworkManager...`);
    if (!(await pollUntil(() => this.ap.deviceReady(), this.bounds, this.clock))) {
      return this.timeout(`${this.iface} stayed unavailable in NetworkManager`);
    }
    log.info(`${this.iface} is ready`);

    log.info("Waiting for NetworkManager...");
    if (!(await pollUntil(() => this.nm.generalStatusOk(), this.bounds, this.clock))) {
      return this.timeout("NetworkManager not ready");
    }
    log.info("NetworkManager is ready");

    if (!(await this.ap.isInstalled())) {
      const message = `Connection '${this.ap.connectionName}' does not exist - run configure first`;
      log.error(message);
      return failed("precondition", message);
    }

    // firmware keeps initialising for a while after the device is reported
    await this.clock.sleep(this.timing.firmwareSettleMs);

    log.info("Activating WiFi AP...");
    const attempts = this.timing.activationAttempts;
    let lastError = "";
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const result = await this.ap.activate();
      if (result.ok) {
        log.info(`WiFi AP activated successfully on attempt ${attempt}`);
        return succeeded(...warnings);
      }
      lastError = result.error;
      if (attempt < attempts) {
        log.warn(`Attempt ${attempt} failed, retrying in ${this.timing.activationRetryDelayMs / 1000}s...`);
        await this.clock.sleep(this.timing.activationRetryDelayMs);
      }
    }

    const message = `Failed to activate WiFi AP after ${attempts} attempts: ${lastError}`;
    log.error(message);
    return failed("command", message);
  }

  private timeout(reason: string): OperationResult {
    const message = `${reason} after ${this.timing.readinessTimeoutMs / 1000}s - aborting`;
    log.error(message);
    return failed("readiness-timeout", message);
  }
}
