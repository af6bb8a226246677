import type { AppConfig } from "../config.ts";
import type {
  AccessPointClient,
  AccessPointConfig,
  AccessPointStatus,
  OperationResult,
} from "../types/index.ts";
import type { Clock } from "../utils/clock.ts";
import { pollAttempts } from "../utils/poll.ts";
import { isValidIPv4 } from "../utils/net.ts";
import { failed, succeeded } from "../utils/result.ts";
import { createLogger } from "../utils/logger.ts";
import type { BootUnitInstaller } from "./boot-unit.ts";
import { excludeWirelessInterface } from "./dhcp-directives.ts";
import type { DnsmasqConfigStore } from "./dnsmasq.ts";
import type { NetworkManagerClient } from "./network-manager.ts";
import type { NetworkService } from "./network.ts";
import { StatusCache } from "./status-cache.ts";

const log = createLogger("wifi-ap");

const SSID_FIELD = "802-11-wireless.ssid";
const CHANNEL_FIELD = "802-11-wireless.channel";
const ADDRESS_FIELD = "ipv4.addresses";

export const MIN_KEY_LENGTH = 8;
export const MIN_CHANNEL = 1;
export const MAX_CHANNEL = 11;

export interface AccessPointProbes {
  installed: boolean;
  enabled: boolean;
  active: boolean;
  config: AccessPointConfig | null;
}

/**
 * The WiFi access point, run as a NetworkManager profile in "shared" mode so
 * NetworkManager serves DHCP/DNS to its clients.
 *
 * The profile never autoconnects; boot activation goes through the oneshot
 * unit installed by `enable()`, which waits for the radio to be ready.
 * Installed, enabled and active are independent facts, each read through
 * the status cache and invalidated by every mutating call.
 */
export class AccessPointController {
  readonly cache: StatusCache<AccessPointProbes>;
  private readonly ap: AppConfig["accessPoint"];
  private readonly timing: AppConfig["timing"];

  constructor(
    config: AppConfig,
    private readonly nm: NetworkManagerClient,
    private readonly network: NetworkService,
    private readonly dnsmasq: DnsmasqConfigStore,
    private readonly bootUnit: BootUnitInstaller,
    private readonly clock: Clock,
    cache?: StatusCache<AccessPointProbes>,
  ) {
    this.ap = config.accessPoint;
    this.timing = config.timing;
    this.cache = cache ?? new StatusCache<AccessPointProbes>(config.timing.cacheTtlMs, clock);
  }

  get connectionName(): string {
    return this.ap.connectionName;
  }

  async isInstalled(): Promise<boolean> {
    return this.cache.getOrFetch("installed", () => this.nm.connectionExists(this.ap.connectionName));
  }

  /** Whether the boot activation unit is enabled. */
  async isEnabled(): Promise<boolean> {
    return this.cache.getOrFetch("enabled", () => this.bootUnit.unit.isEnabled());
  }

  async isActive(): Promise<boolean> {
    return this.cache.getOrFetch("active", async () => {
      const active = await this.nm.activeConnections();
      return active.includes(this.ap.connectionName);
    });
  }

  async getConfig(): Promise<AccessPointConfig | null> {
    if (!(await this.isInstalled())) return null;
    return this.cache.getOrFetch("config", () => this.readConfig());
  }

  async getConnectedClients(): Promise<AccessPointClient[]> {
    if (!(await this.isActive())) return [];
    return this.network.neighbors(this.ap.interface);
  }

  async getStatus(): Promise<AccessPointStatus> {
    const [installed, enabled, active, config, clients] = await Promise.all([
      this.isInstalled(),
      this.isEnabled(),
      this.isActive(),
      this.getConfig(),
      this.getConnectedClients(),
    ]);
    return { installed, enabled, active, config, clients };
  }

  /**
   * Recreates the AP profile from scratch. Nothing is touched when the
   * input is invalid.
   */
  async configure(
    ssid: string,
    key: string,
    channel: number = this.ap.defaultChannel,
    gateway: string = this.ap.defaultAddress,
  ): Promise<OperationResult> {
    if (ssid.length < 1 || ssid.length > 32) {
      return failed("validation", "SSID must be between 1 and 32 characters");
    }
    if (key.length < MIN_KEY_LENGTH) {
      return failed("validation", `Password must be at least ${MIN_KEY_LENGTH} characters`);
    }
    if (!Number.isInteger(channel) || channel < MIN_CHANNEL || channel > MAX_CHANNEL) {
      return failed("validation", `Channel must be between ${MIN_CHANNEL} and ${MAX_CHANNEL}`);
    }
    if (!isValidIPv4(gateway)) {
      return failed("validation", `Invalid IP address: ${gateway}`);
    }

    try {
      await this.nm.deleteConnection(this.ap.connectionName);

      const result = await this.nm.addConnection("wifi", this.ap.interface, this.ap.connectionName, {
        "connection.autoconnect": "no",
        ssid,
        "802-11-wireless.mode": "ap",
        "802-11-wireless.band": "bg",
        [CHANNEL_FIELD]: String(channel),
        "ipv4.method": "shared",
        [ADDRESS_FIELD]: `${gateway}/24`,
        "wifi-sec.key-mgmt": "wpa-psk",
        "wifi-sec.psk": key,
      });
      if (!result.ok) {
        return failed("command", `Failed to create NetworkManager AP connection: ${result.stderr}`);
      }

      log.info(`WiFi AP configured: SSID=${ssid}, Channel=${channel}, IP=${gateway}`);
      return succeeded();
    } finally {
      this.cache.invalidateAll();
    }
  }

  /** Activates the AP now and registers the boot activation unit. */
  async enable(): Promise<OperationResult> {
    if (!(await this.isInstalled())) {
      return failed("precondition", "WiFi AP not configured - run configure first");
    }

    try {
      const radio = await this.unblockRadio();
      if (!radio.ok) return radio;

      const ready = await pollAttempts(
        () => this.deviceReady(),
        this.timing.enablePollAttempts,
        this.timing.enablePollIntervalMs,
        this.clock,
      );
      if (!ready) {
        return failed("readiness-timeout", `${this.ap.interface} did not become ready`);
      }

      const autoconnect = await this.disableAutoconnect();
      if (!autoconnect.ok) {
        return failed("command", `Could not disable autoconnect: ${autoconnect.stderr}`);
      }

      await this.bootUnit.removeLegacyUnits();

      const exclusion = await this.enforceDhcpExclusion();
      if (!exclusion.ok) return exclusion;

      const boot = await this.bootUnit.install();
      if (!boot.ok) return boot;

      const up = await this.nm.up(this.ap.connectionName);
      if (!up.ok) {
        return failed("command", `Failed to activate WiFi AP: ${up.stderr}`);
      }

      log.info("WiFi AP enabled and active - will auto-start on boot");
      return succeeded(...exclusion.warnings, ...boot.warnings);
    } finally {
      this.cache.invalidateAll();
    }
  }

  /** Deactivates the AP and removes boot activation. Deactivation failures are only logged. */
  async disable(): Promise<OperationResult> {
    try {
      const down = await this.nm.down(this.ap.connectionName);
      if (!down.ok) {
        log.warn(`Could not deactivate WiFi AP (may not be active): ${down.stderr}`);
      }

      if (await this.nm.connectionExists(this.ap.connectionName)) {
        await this.disableAutoconnect();
      }

      await this.bootUnit.uninstall();
      await this.bootUnit.removeLegacyUnits();

      log.info("WiFi AP disabled - will not auto-start on boot");
      return succeeded();
    } finally {
      this.cache.invalidateAll();
    }
  }

  async restart(): Promise<OperationResult> {
    try {
      await this.nm.down(this.ap.connectionName);
      await this.clock.sleep(this.timing.restartSettleMs);

      const up = await this.nm.up(this.ap.connectionName);
      if (!up.ok) {
        return failed("command", `Failed to restart WiFi AP: ${up.stderr}`);
      }
      log.info("WiFi AP restarted");
      return succeeded();
    } finally {
      this.cache.invalidateAll();
    }
  }

  /** Single activation attempt, used by the boot sequence. */
  async activate(): Promise<OperationResult> {
    try {
      const up = await this.nm.up(this.ap.connectionName);
      return up.ok ? succeeded() : failed("command", up.stderr);
    } finally {
      this.cache.invalidateAll();
    }
  }

  async unblockRadio(): Promise<OperationResult> {
    const rfkill = await this.network.unblockWifi();
    if (!rfkill.ok) {
      return failed("command", `Could not unblock WiFi radio: ${rfkill.stderr}`);
    }
    // rfkill alone is not always enough
    const radio = await this.nm.radioWifiOn();
    if (!radio.ok) {
      return failed("command", `Could not enable WiFi radio: ${radio.stderr}`);
    }
    return succeeded();
  }

  /** NetworkManager reports the interface as usable (not "unavailable"). */
  async deviceReady(): Promise<boolean> {
    const state = await this.nm.deviceState(this.ap.interface);
    return state === "disconnected" || state === "connected";
  }

  /**
   * Keeps the system dnsmasq off the wireless interface: bind-dynamic plus
   * except-interface, and no leftover interface= line for it.
   */
  async enforceDhcpExclusion(): Promise<OperationResult> {
    return this.dnsmasq.apply(
      (doc) => excludeWirelessInterface(doc, this.ap.interface),
      `Excluded ${this.ap.interface} from system dnsmasq`,
    );
  }

  private async disableAutoconnect() {
    return this.nm.modifyConnection(this.ap.connectionName, { "connection.autoconnect": "no" });
  }

  private async readConfig(): Promise<AccessPointConfig> {
    const config: AccessPointConfig = {
      ssid: this.ap.defaultSsid,
      channel: this.ap.defaultChannel,
      interface: this.ap.interface,
      ipAddress: this.ap.defaultAddress,
    };

    const fields = await this.nm.connectionFields(this.ap.connectionName, [
      SSID_FIELD,
      CHANNEL_FIELD,
      ADDRESS_FIELD,
    ]);

    const ssid = fields.get(SSID_FIELD);
    if (ssid) config.ssid = ssid;

    const channel = Number.parseInt(fields.get(CHANNEL_FIELD) ?? "", 10);
    if (Number.isInteger(channel) && channel > 0) config.channel = channel;

    const address = (fields.get(ADDRESS_FIELD) ?? "").split(",")[0]?.trim().split("/")[0] ?? "";
    if (isValidIPv4(address)) config.ipAddress = address;

    return config;
  }
}
