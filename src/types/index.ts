import type { AppConfig } from "../config.ts";

export type { AppConfig };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type InterfaceKind = "wired" | "wireless" | "loopback";

export interface NetworkInterface {
  name: string;
  kind: InterfaceKind;
  up: boolean;
  linkUp: boolean;
  macAddress: string | null;
  ipAddress: string | null;
  prefix: number | null;
  driver: string | null;
}

export interface DhcpScope {
  interface: string;
  rangeStart: string;
  rangeEnd: string;
  leaseTime: string;
  gateway: string;
  dnsServers: string[];
}

export interface DhcpReservation {
  macAddress: string;
  ipAddress: string;
  hostname: string | null;
}

export interface AccessPointConfig {
  ssid: string;
  channel: number;
  interface: string;
  ipAddress: string;
}

export interface AccessPointClient {
  ipAddress: string;
  macAddress: string;
  state: "REACHABLE" | "STALE";
}

export interface AccessPointStatus {
  installed: boolean;
  enabled: boolean;
  active: boolean;
  config: AccessPointConfig | null;
  clients: AccessPointClient[];
}

export type FailureKind = "validation" | "command" | "readiness-timeout" | "precondition";

export type OperationResult =
  | { ok: true; warnings: string[] }
  | { ok: false; kind: FailureKind; error: string };

export interface SystemStatus {
  dnsmasq: boolean;
  networkManager: boolean;
  adaptersCount: number;
  reservationsCount: number;
}

export interface AuditLog {
  id: number;
  timestamp: string;
  action: string;
  resource: string;
  resource_id: string | null;
  details: string | null;
  ip_address: string;
  success: number;
}
