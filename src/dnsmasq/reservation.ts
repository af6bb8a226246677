import type { DhcpReservation } from "../types/index.ts";
import { isValidHostname, isValidIPv4, isValidMac, normalizeMac } from "../utils/net.ts";
import type { ConfigLine } from "./document.ts";

export const RESERVATION_KEY = "dhcp-host";
export const RESERVATIONS_HEADER = "# DHCP Reservations";
/** Section headers written by earlier installs; new reservations join them. */
export const LEGACY_RESERVATIONS_HEADERS = ["# WLED Reservations"] as const;

export type ParsedReservation =
  | { ok: true; reservation: DhcpReservation }
  | { ok: false; raw: string; reason: string };

/** dhcp-host=<mac>[,<hostname>],<ip> */
export function formatReservation(reservation: DhcpReservation): string {
  const fields = [reservation.macAddress];
  if (reservation.hostname) fields.push(reservation.hostname);
  fields.push(reservation.ipAddress);
  return `${RESERVATION_KEY}=${fields.join(",")}`;
}

/**
 * Parses the value of a dhcp-host line. Only the two shapes this tool writes
 * are accepted; any other field count is reported rather than guessed at.
 */
export function parseReservation(value: string): ParsedReservation {
  const raw = `${RESERVATION_KEY}=${value}`;
  const fields = value.split(",").map((field) => field.trim());

  if (fields.length !== 2 && fields.length !== 3) {
    return { ok: false, raw, reason: `expected 2 or 3 fields, found ${fields.length}` };
  }

  const [first = "", second = "", third = ""] = fields;
  const mac = normalizeMac(first);
  const hostname = fields.length === 3 ? second : null;
  const ip = fields.length === 3 ? third : second;

  if (!isValidMac(mac)) {
    return { ok: false, raw, reason: `invalid MAC address "${mac}"` };
  }
  if (!isValidIPv4(ip)) {
    return { ok: false, raw, reason: `invalid IPv4 address "${ip}"` };
  }
  if (hostname !== null && !isValidHostname(hostname)) {
    return { ok: false, raw, reason: `invalid hostname "${hostname}"` };
  }
  return { ok: true, reservation: { macAddress: mac, ipAddress: ip, hostname } };
}

/** True for any dhcp-host line, optionally restricted to one MAC. */
export function isReservationLine(line: ConfigLine, mac?: string): boolean {
  if (line.kind !== "directive" || line.key !== RESERVATION_KEY || line.value === null) {
    return false;
  }
  if (mac === undefined) return true;
  const first = line.value.split(",")[0] ?? "";
  return normalizeMac(first) === normalizeMac(mac);
}
