import { test, expect } from "vitest";
import { DnsmasqDocument, parseLine } from "../src/dnsmasq/document.ts";
import {
  RESERVATIONS_HEADER,
  formatReservation,
  isReservationLine,
  parseReservation,
} from "../src/dnsmasq/reservation.ts";

const ETH1 = "# eth1 - USB Ethernet Adapter";

// ---- Parsing ----
test("parseLine classifies markers, comments and directives", () => {
  expect(parseLine("# wlan0 - WiFi AP")).toEqual({
    kind: "marker",
    raw: "# wlan0 - WiFi AP",
    subject: "wlan0",
    purpose: "WiFi AP",
  });
  expect(parseLine("# DHCP Reservations").kind).toBe("comment");
  expect(parseLine("   ").kind).toBe("blank");
  expect(parseLine("dhcp-host=aa:bb:cc:dd:ee:ff,10.0.0.2")).toEqual({
    kind: "directive",
    raw: "dhcp-host=aa:bb:cc:dd:ee:ff,10.0.0.2",
    key: "dhcp-host",
    value: "aa:bb:cc:dd:ee:ff,10.0.0.2",
  });
  expect(parseLine("bind-dynamic")).toEqual({ kind: "directive", raw: "bind-dynamic", key: "bind-dynamic", value: null });
});

test("untouched text serialises unchanged", () => {
  const text = "  port=0\n#comment\n\n";
  expect(DnsmasqDocument.parse(text).serialize()).toBe(text);
});

test("a missing final newline is added", () => {
  expect(DnsmasqDocument.parse("domain-needed").serialize()).toBe("domain-needed\n");
  expect(DnsmasqDocument.parse("").serialize()).toBe("");
});

// ---- Blocks ----
test("upsertBlock applied repeatedly leaves one block", () => {
  const doc = DnsmasqDocument.parse("");
  const body = ["interface=eth1", "dhcp-range=eth1,10.0.0.10,10.0.0.50,24h"];

  expect(doc.upsertBlock(ETH1, body)).toBe(true);
  expect(doc.upsertBlock(ETH1, body)).toBe(false);
  expect(doc.upsertBlock(ETH1, body)).toBe(false);

  expect(doc.countLine(ETH1)).toBe(1);
  expect(doc.serialize()).toBe(
    "# eth1 - USB Ethernet Adapter\ninterface=eth1\ndhcp-range=eth1,10.0.0.10,10.0.0.50,24h\n",
  );
});

test("upsertBlock moves the replaced block to the end and keeps other lines", () => {
  const doc = DnsmasqDocument.parse(
    "# Global\ndomain-needed\n\n# eth1 - USB Ethernet Adapter\ninterface=eth1\n\nbogus-priv\n",
  );

  doc.upsertBlock(ETH1, ["interface=eth1", "dhcp-range=eth1,10.0.1.10,10.0.1.50,24h"]);

  expect(doc.serialize()).toBe(
    "# Global\ndomain-needed\n\nbogus-priv\n\n# eth1 - USB Ethernet Adapter\ninterface=eth1\ndhcp-range=eth1,10.0.1.10,10.0.1.50,24h\n",
  );
});

test("a block ends at the next marker", () => {
  const doc = DnsmasqDocument.parse(
    "# eth1 - USB Ethernet Adapter\ninterface=eth1\n# eth2 - USB Ethernet Adapter\ninterface=eth2\n",
  );
  expect(doc.blockLines(ETH1)).toEqual([ETH1, "interface=eth1"]);

  doc.removeBlock(ETH1);
  expect(doc.serialize()).toBe("# eth2 - USB Ethernet Adapter\ninterface=eth2\n");
});

test("removing a leading block drops its separator", () => {
  const doc = DnsmasqDocument.parse("# eth1 - USB Ethernet Adapter\ninterface=eth1\n\nbind-dynamic\n");
  expect(doc.removeBlock(ETH1)).toBe(true);
  expect(doc.serialize()).toBe("bind-dynamic\n");
  expect(doc.removeBlock(ETH1)).toBe(false);
});

// ---- Singletons ----
test("ensureSingletonLine twice yields one line", () => {
  const doc = DnsmasqDocument.parse("domain-needed\n");
  expect(doc.ensureSingletonLine("bind-dynamic")).toBe(true);
  expect(doc.ensureSingletonLine("bind-dynamic")).toBe(false);
  expect(doc.serialize()).toBe("domain-needed\nbind-dynamic\n");
});

test("ensureSingletonLine collapses existing duplicates", () => {
  const doc = DnsmasqDocument.parse("bind-dynamic\nfoo\n  bind-dynamic  \n");
  expect(doc.ensureSingletonLine("bind-dynamic")).toBe(true);
  expect(doc.serialize()).toBe("bind-dynamic\nfoo\n");
});

test("a singleton appended after a block is kept out of it", () => {
  const doc = DnsmasqDocument.parse("# eth1 - USB Ethernet Adapter\ninterface=eth1\n");
  doc.ensureSingletonLine("bind-dynamic");
  expect(doc.serialize()).toBe("# eth1 - USB Ethernet Adapter\ninterface=eth1\n\nbind-dynamic\n");
  expect(doc.blockLines(ETH1)).toEqual([ETH1, "interface=eth1"]);
});

// ---- Sections ----
test("appendToSection creates the section once and groups its lines", () => {
  const doc = DnsmasqDocument.parse("domain-needed\n");
  const belongs = (line: Parameters<typeof isReservationLine>[0]) => isReservationLine(line);

  doc.appendToSection(RESERVATIONS_HEADER, "dhcp-host=aa:bb:cc:dd:ee:01,10.0.0.10", belongs);
  doc.appendToSection(RESERVATIONS_HEADER, "dhcp-host=aa:bb:cc:dd:ee:02,10.0.0.11", belongs);

  expect(doc.serialize()).toBe(
    "domain-needed\n\n# DHCP Reservations\ndhcp-host=aa:bb:cc:dd:ee:01,10.0.0.10\ndhcp-host=aa:bb:cc:dd:ee:02,10.0.0.11\n",
  );
});

// ---- Reservation lines ----
test("formatReservation puts the hostname between MAC and IP", () => {
  expect(formatReservation({ macAddress: "aa:bb:cc:dd:ee:ff", ipAddress: "10.0.0.5", hostname: "printer" })).toBe(
    "dhcp-host=aa:bb:cc:dd:ee:ff,printer,10.0.0.5",
  );
  expect(formatReservation({ macAddress: "aa:bb:cc:dd:ee:ff", ipAddress: "10.0.0.5", hostname: null })).toBe(
    "dhcp-host=aa:bb:cc:dd:ee:ff,10.0.0.5",
  );
});

test("parseReservation accepts two or three fields", () => {
  expect(parseReservation("AA:BB:CC:DD:EE:FF,10.0.0.5")).toEqual({
    ok: true,
    reservation: { macAddress: "aa:bb:cc:dd:ee:ff", ipAddress: "10.0.0.5", hostname: null },
  });
  expect(parseReservation("aa:bb:cc:dd:ee:ff,printer,10.0.0.5")).toEqual({
    ok: true,
    reservation: { macAddress: "aa:bb:cc:dd:ee:ff", ipAddress: "10.0.0.5", hostname: "printer" },
  });
});

test("parseReservation rejects other field counts instead of guessing", () => {
  expect(parseReservation("aa:bb:cc:dd:ee:ff,set:lan,printer,10.0.0.5")).toEqual({
    ok: false,
    raw: "dhcp-host=aa:bb:cc:dd:ee:ff,set:lan,printer,10.0.0.5",
    reason: "expected 2 or 3 fields, found 4",
  });
  expect(parseReservation("aa:bb:cc:dd:ee:ff")).toMatchObject({ ok: false, reason: "expected 2 or 3 fields, found 1" });
  expect(parseReservation("aa:bb:cc:dd:ee:ff,printer")).toMatchObject({
    ok: false,
    reason: 'invalid IPv4 address "printer"',
  });
});
