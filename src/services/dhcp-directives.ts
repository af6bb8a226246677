import type { DnsmasqDocument } from "../dnsmasq/document.ts";

/** Bind only to interfaces dnsmasq is configured for, following them as they appear. */
export const BIND_DYNAMIC = "bind-dynamic";
/** Older setups used this; dnsmasq refuses to start with both. */
export const LEGACY_BIND_INTERFACES = "bind-interfaces";

export function exceptInterface(iface: string): string {
  return `except-interface=${iface}`;
}

/**
 * Keeps the system dnsmasq off `wirelessIface` so NetworkManager's own
 * dnsmasq (shared mode) can bind ports 53 and 67 there. Returns whether the
 * document changed.
 */
export function excludeWirelessInterface(doc: DnsmasqDocument, wirelessIface: string): boolean {
  let changed = false;
  changed = doc.removeLine(LEGACY_BIND_INTERFACES) || changed;
  changed = doc.ensureSingletonLine(BIND_DYNAMIC) || changed;
  changed = doc.ensureSingletonLine(exceptInterface(wirelessIface)) || changed;
  changed = doc.removeLine(`interface=${wirelessIface}`) || changed;
  return changed;
}
