import { existsSync } from "node:fs";
import { realpath } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import type { AccessPointClient, InterfaceKind, NetworkInterface } from "../types/index.ts";
import type { CommandResult, CommandRunner } from "../utils/shell.ts";
import { systemRunner } from "../utils/shell.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("network");

const addrInfoSchema = z.object({
  family: z.string(),
  local: z.string(),
  prefixlen: z.number(),
});

const ipLinkSchema = z.object({
  ifname: z.string(),
  flags: z.array(z.string()).default([]),
  link_type: z.string().optional(),
  address: z.string().optional(),
  addr_info: z.array(addrInfoSchema.passthrough()).default([]),
});

const ipNeighSchema = z.object({
  dst: z.string(),
  lladdr: z.string().optional(),
  state: z.array(z.string()).default([]),
});

/** `ip -j` output; truncated or garbled text fails validation like a schema mismatch. */
const jsonOutput = z.string().transform((text, ctx): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

const ipLinksOutput = jsonOutput.pipe(z.array(ipLinkSchema.passthrough()));
const ipNeighOutput = jsonOutput.pipe(z.array(ipNeighSchema.passthrough()));

/** Address/link control plane: `ip` and `rfkill`. */
export class NetworkService {
  constructor(
    private readonly runner: CommandRunner = systemRunner,
    private readonly sysfsRoot = "/sys/class/net",
  ) {}

  async listInterfaces(): Promise<NetworkInterface[]> {
    const result = await this.runner.run(["ip", "-j", "addr", "show"]);
    if (!result.ok || result.stdout === "") return [];

    const parsed = ipLinksOutput.safeParse(result.stdout);
    if (!parsed.success) {
      log.warn(`Unexpected "ip -j addr show" output: ${parsed.error.message}`);
      return [];
    }

    return Promise.all(
      parsed.data.map(async (link) => {
        const inet = link.addr_info.find((info) => info.family === "inet");
        return {
          name: link.ifname,
          kind: this.kindOf(link.ifname, link.link_type),
          up: link.flags.includes("UP"),
          linkUp: link.flags.includes("LOWER_UP"),
          macAddress: link.link_type === "ether" ? (link.address ?? null) : null,
          ipAddress: inet?.local ?? null,
          prefix: inet?.prefixlen ?? null,
          driver: await this.driverOf(link.ifname),
        };
      }),
    );
  }

  async linkExists(iface: string): Promise<boolean> {
    const result = await this.runner.run(["ip", "link", "show", iface], { quiet: true });
    return result.ok;
  }

  /** Neighbour-table entries on `iface` that are REACHABLE or STALE. */
  async neighbors(iface: string): Promise<AccessPointClient[]> {
    const result = await this.runner.run(["ip", "-j", "neigh", "show", "dev", iface]);
    if (!result.ok || result.stdout === "") return [];

    const parsed = ipNeighOutput.safeParse(result.stdout);
    if (!parsed.success) {
      log.warn(`Unexpected "ip -j neigh show" output: ${parsed.error.message}`);
      return [];
    }

    const clients: AccessPointClient[] = [];
    for (const entry of parsed.data) {
      const state = entry.state.includes("REACHABLE")
        ? "REACHABLE"
        : entry.state.includes("STALE")
          ? "STALE"
          : null;
      if (state === null || !entry.lladdr) continue;
      clients.push({ ipAddress: entry.dst, macAddress: entry.lladdr.toLowerCase(), state });
    }
    return clients;
  }

  async unblockWifi(): Promise<CommandResult> {
    return this.runner.run(["rfkill", "unblock", "wifi"]);
  }

  private kindOf(name: string, linkType: string | undefined): InterfaceKind {
    if (linkType === "loopback") return "loopback";
    if (name.startsWith("wl") || existsSync(join(this.sysfsRoot, name, "wireless"))) {
      return "wireless";
    }
    return "wired";
  }

  private async driverOf(name: string): Promise<string | null> {
    try {
      return basename(await realpath(join(this.sysfsRoot, name, "device", "driver")));
    } catch {
      // virtual interfaces have no backing device
      return null;
    }
  }
}
