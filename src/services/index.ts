import type { AppConfig } from "../config.ts";
import type { Clock } from "../utils/clock.ts";
import { systemClock } from "../utils/clock.ts";
import type { CommandRunner } from "../utils/shell.ts";
import { systemRunner } from "../utils/shell.ts";
import { AccessPointController } from "./access-point.ts";
import { AdapterConfigurator } from "./adapter.ts";
import { BootActivationSequencer } from "./boot-sequencer.ts";
import { BootUnitInstaller } from "./boot-unit.ts";
import { DnsmasqConfigStore } from "./dnsmasq.ts";
import { NetworkManagerClient } from "./network-manager.ts";
import { NetworkService } from "./network.ts";
import { SystemdUnit } from "./systemd.ts";

export interface ServiceOptions {
  runner?: CommandRunner;
  clock?: Clock;
  /** Path of the config file the boot unit passes back to `boot-ap`. */
  configPath: string;
  sysfsRoot?: string;
}

export interface Services {
  config: AppConfig;
  runner: CommandRunner;
  nm: NetworkManagerClient;
  network: NetworkService;
  dnsmasq: DnsmasqConfigStore;
  networkManagerService: SystemdUnit;
  bootUnit: BootUnitInstaller;
  adapters: AdapterConfigurator;
  accessPoint: AccessPointController;
  bootSequencer: BootActivationSequencer;
}

/** Wires every service against one command runner and clock. */
export function createServices(config: AppConfig, options: ServiceOptions): Services {
  const runner = options.runner ?? systemRunner;
  const clock = options.clock ?? systemClock;

  const nm = new NetworkManagerClient(runner);
  const network = new NetworkService(runner, options.sysfsRoot);
  const dnsmasq = new DnsmasqConfigStore(
    config.dnsmasq.configPath,
    new SystemdUnit(config.dnsmasq.serviceName, runner),
  );
  const bootUnit = new BootUnitInstaller(config, options.configPath, runner);
  const adapters = new AdapterConfigurator(config, nm, network, dnsmasq);
  const accessPoint = new AccessPointController(config, nm, network, dnsmasq, bootUnit, clock);
  const bootSequencer = new BootActivationSequencer(config, accessPoint, nm, network, clock);

  return {
    config,
    runner,
    nm,
    network,
    dnsmasq,
    networkManagerService: new SystemdUnit("NetworkManager", runner),
    bootUnit,
    adapters,
    accessPoint,
    bootSequencer,
  };
}
