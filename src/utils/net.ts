const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const MAC_PATTERN = /^([0-9a-f]{2}:){5}[0-9a-f]{2}$/;
const INTERFACE_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,14}$/;
const HOSTNAME_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;

export function isValidIPv4(address: string): boolean {
  const match = IPV4_PATTERN.exec(address);
  if (!match) return false;
  return match.slice(1).every((octet) => Number(octet) <= 255);
}

export function normalizeMac(mac: string): string {
  return mac.trim().toLowerCase();
}

/** Expects the lowercase, colon-separated form; call `normalizeMac` first. */
export function isValidMac(mac: string): boolean {
  return MAC_PATTERN.test(mac);
}

export function isValidInterfaceName(name: string): boolean {
  return INTERFACE_PATTERN.test(name);
}

export function isValidHostname(hostname: string): boolean {
  return HOSTNAME_PATTERN.test(hostname);
}

/** "10.0.0.1" -> "10.0.0" */
export function networkPrefix24(address: string): string {
  return address.split(".").slice(0, 3).join(".");
}
