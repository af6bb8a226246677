import type { AppConfig } from "../config.ts";
import type { DhcpScope, NetworkInterface, OperationResult } from "../types/index.ts";
import { formatMarker, parseLine } from "../dnsmasq/document.ts";
import { isValidIPv4, isValidInterfaceName, networkPrefix24 } from "../utils/net.ts";
import { failed, succeeded } from "../utils/result.ts";
import { createLogger } from "../utils/logger.ts";
import type { DnsmasqConfigStore } from "./dnsmasq.ts";
import type { NetworkManagerClient } from "./network-manager.ts";
import type { NetworkService } from "./network.ts";
import { BIND_DYNAMIC, LEGACY_BIND_INTERFACES } from "./dhcp-directives.ts";

const log = createLogger("adapter");

const STATIC_SUFFIX = "-static";
const USB_PREFIXES = ["eth", "usb", "enx"];

export function dhcpScopeFor(iface: string, gateway: string, dhcp: AppConfig["dhcp"]): DhcpScope {
  const prefix = networkPrefix24(gateway);
  return {
    interface: iface,
    rangeStart: `${prefix}.${dhcp.rangeStartHost}`,
    rangeEnd: `${prefix}.${dhcp.rangeEndHost}`,
    leaseTime: dhcp.leaseTime,
    gateway,
    dnsServers: dhcp.dnsServers,
  };
}

export function formatScopeBody(scope: DhcpScope): string[] {
  const lines = [
    `interface=${scope.interface}`,
    `dhcp-range=${scope.interface},${scope.rangeStart},${scope.rangeEnd},${scope.leaseTime}`,
    `dhcp-option=${scope.interface},3,${scope.gateway}`,
  ];
  if (scope.dnsServers.length > 0) {
    lines.push(`dhcp-option=${scope.interface},6,${scope.dnsServers.join(",")}`);
  }
  return lines;
}

const SCOPE_KEYS = new Set(["interface", "dhcp-range", "dhcp-option"]);

/**
 * Directives inside a scope block that are not part of the scope, such as an
 * `except-interface` line appended straight after the block by older installs.
 */
function strayDirectives(block: readonly string[]): string[] {
  return block
    .map(parseLine)
    .filter((line) => line.kind === "directive" && !SCOPE_KEYS.has(line.key))
    .map((line) => line.raw.trim());
}

/** Static addressing and DHCP scopes for wired (USB Ethernet) adapters. */
export class AdapterConfigurator {
  constructor(
    private readonly config: AppConfig,
    private readonly nm: NetworkManagerClient,
    private readonly network: NetworkService,
    private readonly dnsmasq: DnsmasqConfigStore,
  ) {}

  scopeMarker(iface: string): string {
    return formatMarker(iface, this.config.adapters.markerPurpose);
  }

  async listAdapters(): Promise<NetworkInterface[]> {
    const interfaces = await this.network.listInterfaces();
    return interfaces.filter((iface) => iface.kind !== "loopback");
  }

  /** Wired adapters other than the built-in port. */
  async listUsbAdapters(): Promise<NetworkInterface[]> {
    const adapters = await this.listAdapters();
    return adapters.filter(
      (iface) =>
        iface.kind === "wired" &&
        iface.name !== this.config.adapters.builtinInterface &&
        USB_PREFIXES.some((prefix) => iface.name.startsWith(prefix)),
    );
  }

  /**
   * Gives `iface` a static address through a `<iface>-static` profile and
   * serves DHCP on it. The scope is only written the first time unless
   * `dhcp.replaceScopeOnReassign` is set; a DHCP problem leaves the address
   * configured and is returned as a warning.
   */
  async assign(iface: string, ipAddress: string, prefix = 24): Promise<OperationResult> {
    if (!isValidInterfaceName(iface)) {
      return failed("validation", `Invalid interface name: ${iface}`);
    }
    if (iface === this.config.accessPoint.interface) {
      return failed("validation", `${iface} is reserved for the WiFi access point`);
    }
    if (!isValidIPv4(ipAddress)) {
      return failed("validation", `Invalid IP address: ${ipAddress}`);
    }
    if (!Number.isInteger(prefix) || prefix < 1 || prefix > 32) {
      return failed("validation", `Invalid prefix length: ${prefix}`);
    }

    const connection = `${iface}${STATIC_SUFFIX}`;
    const address = `${ipAddress}/${prefix}`;
    const profile =
      (await this.nm.connectionExists(connection))
        ? await this.modifyProfile(connection, address)
        : await this.createProfile(iface, connection, address);
    if (!profile.ok) {
      return failed("command", `Failed to save connection ${connection}: ${profile.stderr}`);
    }

    const up = await this.nm.up(connection);
    if (!up.ok) {
      return failed("command", `Failed to activate ${connection}: ${up.stderr}`);
    }
    log.info(`Configured ${iface} with IP ${address}`);

    const dhcp = await this.configureDhcp(iface, ipAddress);
    if (!dhcp.ok) {
      return succeeded(`Network configured but DHCP setup failed for ${iface}: ${dhcp.error}`);
    }
    if (dhcp.warnings.length > 0) {
      return succeeded(`Network configured but DHCP not applied for ${iface}`, ...dhcp.warnings);
    }
    return dhcp;
  }

  /** Brings up every `*-static` profile; used at boot for adapters present before NetworkManager. */
  async activateStaticProfiles(): Promise<OperationResult> {
    const profiles = (await this.nm.listConnections()).filter((name) => name.endsWith(STATIC_SUFFIX));
    const warnings: string[] = [];
    for (const name of profiles) {
      log.info(`Activating connection: ${name}`);
      const result = await this.nm.up(name);
      if (!result.ok) {
        warnings.push(`Could not activate ${name}: ${result.stderr}`);
      }
    }
    return succeeded(...warnings);
  }

  private async createProfile(iface: string, connection: string, address: string) {
    log.info(`Creating new connection: ${connection}`);
    return this.nm.addConnection("ethernet", iface, connection, {
      "ipv4.addresses": address,
      "ipv4.method": "manual",
      "connection.autoconnect": "yes",
    });
  }

  private async modifyProfile(connection: string, address: string) {
    log.info(`Modifying existing connection: ${connection}`);
    return this.nm.modifyConnection(connection, {
      "ipv4.addresses": address,
      "ipv4.method": "manual",
    });
  }

  private async configureDhcp(iface: string, gateway: string): Promise<OperationResult> {
    const marker = this.scopeMarker(iface);
    const scope = dhcpScopeFor(iface, gateway, this.config.dhcp);
    const replace = this.config.dhcp.replaceScopeOnReassign;

    return this.dnsmasq.apply((doc) => {
      // bind-interfaces and bind-dynamic are mutually exclusive in dnsmasq
      let changed = doc.removeLine(LEGACY_BIND_INTERFACES);
      let carried: string[] = [];
      if (!doc.hasBlock(marker) || replace) {
        carried = strayDirectives(doc.blockLines(marker));
        changed = doc.upsertBlock(marker, formatScopeBody(scope)) || changed;
      } else {
        log.info(`DHCP already configured for ${iface}`);
      }
      changed = doc.ensureSingletonLine(BIND_DYNAMIC) || changed;
      for (const line of carried) {
        changed = doc.ensureSingletonLine(line) || changed;
      }
      return changed;
    }, `Added DHCP configuration for ${iface}: ${scope.rangeStart}-${scope.rangeEnd}`);
  }
}
