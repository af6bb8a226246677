const VERSION = "0.1.0";

export type Command = "serve" | "setup" | "boot-ap" | "boot-adapters" | "auto";

export interface ParsedArgs {
  command: Command;
  configPath?: string;
  showHelp: boolean;
  showVersion: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Parses `argv` without its runtime and script entries. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "auto",
    showHelp: false,
    showVersion: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case "serve":
      case "setup":
      case "boot-ap":
      case "boot-adapters":
        result.command = arg;
        break;

      case "--config":
      case "-c":
        i++;
        result.configPath = args[i];
        if (!result.configPath) {
          throw new UsageError("--config requires a path argument");
        }
        break;

      case "--help":
      case "-h":
        result.showHelp = true;
        break;

      case "--version":
      case "-v":
        result.showVersion = true;
        break;

      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
    i++;
  }

  return result;
}

export function printHelp(): void {
  console.log(`
lan-manager v${VERSION} - USB Ethernet, DHCP and WiFi access point manager

Usage:
  lan-manager                   Start REST API server (same as serve)
  lan-manager serve             Start REST API server
  lan-manager setup             Prepare this host (packages, dnsmasq, service)
  lan-manager boot-ap           Activate the WiFi AP once hardware is ready
  lan-manager boot-adapters     Bring up static profiles of USB adapters

Options:
  --config, -c <path>   Config file path (default: $LAN_MANAGER_CONFIG or /etc/lan-manager/config.json)
  --help, -h            Show this help
  --version, -v         Show version
`.trim());
}

export function printVersion(): void {
  console.log(`lan-manager v${VERSION}`);
}

export { VERSION };
