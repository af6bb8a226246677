import type { CommandResult, CommandRunner } from "../utils/shell.ts";
import { systemRunner } from "../utils/shell.ts";

/** Ordered `nmcli` property/value pairs, e.g. { "ipv4.method": "manual" }. */
export type ConnectionSettings = Record<string, string>;

export type DeviceState =
  | "connected"
  | "disconnected"
  | "unavailable"
  | "unmanaged"
  | "connecting"
  | "deactivating"
  | "unknown";

const DEVICE_STATES: readonly DeviceState[] = [
  "connected",
  "disconnected",
  "unavailable",
  "unmanaged",
  "connecting",
  "deactivating",
];

/**
 * Splits one line of `nmcli -t` output. Terse mode escapes ":" and "\" inside
 * values with a backslash.
 */
export function splitTerseLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === "\\" && i + 1 < line.length) {
      current += line[i + 1];
      i++;
    } else if (ch === ":") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function flattenSettings(settings: ConnectionSettings): string[] {
  return Object.entries(settings).flatMap(([key, value]) => [key, value]);
}

export class NetworkManagerClient {
  constructor(private readonly runner: CommandRunner = systemRunner) {}

  async connectionExists(name: string): Promise<boolean> {
    const result = await this.runner.run(["nmcli", "connection", "show", name], { quiet: true });
    return result.ok;
  }

  async listConnections(): Promise<string[]> {
    const result = await this.runner.run(["nmcli", "-t", "-f", "NAME", "connection", "show"]);
    return result.ok ? parseNameList(result.stdout) : [];
  }

  async activeConnections(): Promise<string[]> {
    const result = await this.runner.run(["nmcli", "-t", "-f", "NAME", "connection", "show", "--active"]);
    return result.ok ? parseNameList(result.stdout) : [];
  }

  /** Reads the named profile properties; properties nmcli does not print are absent from the map. */
  async connectionFields(name: string, fields: readonly string[]): Promise<Map<string, string>> {
    const values = new Map<string, string>();
    const result = await this.runner.run(
      ["nmcli", "-t", "-f", fields.join(","), "connection", "show", name],
      { quiet: true },
    );
    if (!result.ok) return values;

    for (const line of result.stdout.split("\n")) {
      const sep = line.indexOf(":");
      if (sep === -1) continue;
      values.set(line.slice(0, sep), splitTerseLine(line.slice(sep + 1)).join(":"));
    }
    return values;
  }

  async addConnection(
    type: "wifi" | "ethernet",
    iface: string,
    name: string,
    settings: ConnectionSettings,
  ): Promise<CommandResult> {
    return this.runner.run([
      "nmcli", "connection", "add",
      "type", type,
      "ifname", iface,
      "con-name", name,
      ...flattenSettings(settings),
    ]);
  }

  async modifyConnection(name: string, settings: ConnectionSettings): Promise<CommandResult> {
    return this.runner.run(["nmcli", "connection", "modify", name, ...flattenSettings(settings)]);
  }

  async deleteConnection(name: string): Promise<CommandResult> {
    return this.runner.run(["nmcli", "connection", "delete", name], { quiet: true });
  }

  async up(name: string): Promise<CommandResult> {
    return this.runner.run(["nmcli", "connection", "up", name]);
  }

  async down(name: string): Promise<CommandResult> {
    return this.runner.run(["nmcli", "connection", "down", name], { quiet: true });
  }

  async deviceState(iface: string): Promise<DeviceState | null> {
    const result = await this.runner.run(["nmcli", "-t", "-f", "DEVICE,STATE", "device"], { quiet: true });
    if (!result.ok) return null;

    for (const line of result.stdout.split("\n")) {
      const [device, state = ""] = splitTerseLine(line);
      if (device !== iface) continue;
      // nmcli prints e.g. "connected (externally)"
      const base = state.split(" ")[0] ?? "";
      return DEVICE_STATES.find((known) => known === base) ?? "unknown";
    }
    return null;
  }

  async generalStatusOk(): Promise<boolean> {
    const result = await this.runner.run(["nmcli", "general", "status"], { quiet: true });
    return result.ok;
  }

  async radioWifiOn(): Promise<CommandResult> {
    return this.runner.run(["nmcli", "radio", "wifi", "on"]);
  }
}

function parseNameList(stdout: string): string[] {
  return stdout
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line) => splitTerseLine(line).join(":"));
}
