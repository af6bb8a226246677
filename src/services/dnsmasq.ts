import { copyFile, readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { DhcpReservation, OperationResult } from "../types/index.ts";
import { DnsmasqDocument } from "../dnsmasq/document.ts";
import {
  LEGACY_RESERVATIONS_HEADERS,
  RESERVATIONS_HEADER,
  formatReservation,
  isReservationLine,
  parseReservation,
} from "../dnsmasq/reservation.ts";
import { isValidHostname, isValidIPv4, isValidMac, normalizeMac } from "../utils/net.ts";
import { failed, succeeded } from "../utils/result.ts";
import { createLogger } from "../utils/logger.ts";
import type { SystemdUnit } from "./systemd.ts";

const log = createLogger("dnsmasq");

/** Returns true when the document was changed. */
export type DocumentMutation = (doc: DnsmasqDocument) => boolean;

export interface ReservationInput {
  macAddress: string;
  ipAddress: string;
  hostname?: string | null;
}

export interface ReservationListing {
  reservations: DhcpReservation[];
  invalid: Array<{ line: string; reason: string }>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * The dnsmasq configuration file, shared by the adapter scopes, the MAC
 * reservations and the access point's exclusion directives.
 *
 * Every mutation parses the file once, edits the line model, writes once
 * (after copying the previous file to `<path>.backup`) and restarts dnsmasq
 * once if anything changed. A failed restart keeps the new file and is
 * reported as a warning.
 *
 * Not locked: concurrent writers from several processes are not supported.
 */
export class DnsmasqConfigStore {
  readonly backupPath: string;

  constructor(
    readonly configPath: string,
    private readonly service: SystemdUnit,
  ) {
    this.backupPath = `${configPath}.backup`;
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.configPath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        log.warn(`Config file ${this.configPath} not found, starting empty`);
        return "";
      }
      throw err;
    }
  }

  async write(text: string): Promise<boolean> {
    try {
      if (existsSync(this.configPath)) {
        await copyFile(this.configPath, this.backupPath);
      }
      await writeFile(this.configPath, text);
      return true;
    } catch (err) {
      log.error(`Error writing ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  async load(): Promise<DnsmasqDocument> {
    return DnsmasqDocument.parse(await this.read());
  }

  /**
   * Applies `mutate` and, if it changed anything, saves and reloads dnsmasq.
   */
  async apply(mutate: DocumentMutation, description: string): Promise<OperationResult> {
    const doc = await this.load();
    if (!mutate(doc)) {
      log.debug(`${description}: already up to date`);
      return succeeded();
    }

    if (!(await this.write(doc.serialize()))) {
      return failed("command", `Could not write ${this.configPath}`);
    }
    log.info(description);
    return this.reload();
  }

  async hasLine(line: string): Promise<boolean> {
    return (await this.load()).hasLine(line);
  }

  async hasBlock(marker: string): Promise<boolean> {
    return (await this.load()).hasBlock(marker);
  }

  async upsertBlock(marker: string, body: readonly string[]): Promise<OperationResult> {
    return this.apply((doc) => doc.upsertBlock(marker, body), `Updated block "${marker}"`);
  }

  async removeBlock(marker: string): Promise<OperationResult> {
    return this.apply((doc) => doc.removeBlock(marker), `Removed block "${marker}"`);
  }

  async ensureSingletonLine(line: string): Promise<OperationResult> {
    return this.apply((doc) => doc.ensureSingletonLine(line), `Ensured "${line}"`);
  }

  async upsertReservation(input: ReservationInput): Promise<OperationResult> {
    const macAddress = normalizeMac(input.macAddress);
    const hostname = input.hostname?.trim() || null;
    if (!isValidMac(macAddress)) {
      return failed("validation", `Invalid MAC address format: ${input.macAddress}`);
    }
    if (!isValidIPv4(input.ipAddress)) {
      return failed("validation", `Invalid IP address: ${input.ipAddress}`);
    }
    if (hostname !== null && !isValidHostname(hostname)) {
      return failed("validation", `Invalid hostname: ${hostname}`);
    }

    const line = formatReservation({ macAddress, ipAddress: input.ipAddress, hostname });
    return this.apply((doc) => {
      const current = doc.lines.filter((existing) => isReservationLine(existing, macAddress));
      if (current.length === 1 && current[0]?.raw.trim() === line) {
        return false;
      }
      doc.removeWhere((existing) => isReservationLine(existing, macAddress));
      doc.appendToSection(
        RESERVATIONS_HEADER,
        line,
        (existing) => isReservationLine(existing),
        LEGACY_RESERVATIONS_HEADERS,
      );
      return true;
    }, `Added reservation: ${macAddress} -> ${input.ipAddress}`);
  }

  async removeReservation(mac: string): Promise<OperationResult> {
    const macAddress = normalizeMac(mac);
    if (!isValidMac(macAddress)) {
      return failed("validation", `Invalid MAC address format: ${mac}`);
    }
    return this.apply(
      (doc) => doc.removeWhere((line) => isReservationLine(line, macAddress)) > 0,
      `Removed reservation for ${macAddress}`,
    );
  }

  /** True when any dhcp-host line names `mac`, parseable or not. */
  async hasReservation(mac: string): Promise<boolean> {
    const macAddress = normalizeMac(mac);
    return (await this.load()).lines.some((line) => isReservationLine(line, macAddress));
  }

  async listReservations(): Promise<ReservationListing> {
    const listing: ReservationListing = { reservations: [], invalid: [] };
    const doc = await this.load();

    for (const directive of doc.directives("dhcp-host")) {
      const parsed = parseReservation(directive.value ?? "");
      if (parsed.ok) {
        listing.reservations.push(parsed.reservation);
      } else {
        log.warn(`Skipping malformed reservation "${parsed.raw}": ${parsed.reason}`);
        listing.invalid.push({ line: directive.raw.trim(), reason: parsed.reason });
      }
    }
    return listing;
  }

  async reload(): Promise<OperationResult> {
    log.info(`Restarting ${this.service.name} service...`);
    const result = await this.service.restart();
    if (!result.ok) {
      return succeeded(`Configuration saved but ${this.service.name} restart failed: ${result.stderr}`);
    }
    return succeeded();
  }

  async isServiceActive(): Promise<boolean> {
    return this.service.isActive();
  }
}
