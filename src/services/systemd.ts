import type { CommandResult, CommandRunner } from "../utils/shell.ts";
import { systemRunner } from "../utils/shell.ts";

export class SystemdUnit {
  constructor(
    public readonly name: string,
    private readonly runner: CommandRunner = systemRunner,
  ) {}

  async start(): Promise<CommandResult> {
    return this.runner.run(["systemctl", "start", this.name]);
  }

  async stop(): Promise<CommandResult> {
    return this.runner.run(["systemctl", "stop", this.name], { quiet: true });
  }

  async restart(): Promise<CommandResult> {
    return this.runner.run(["systemctl", "restart", this.name]);
  }

  async enable(): Promise<CommandResult> {
    return this.runner.run(["systemctl", "enable", this.name]);
  }

  async disable(): Promise<CommandResult> {
    return this.runner.run(["systemctl", "disable", this.name], { quiet: true });
  }

  async isActive(): Promise<boolean> {
    const result = await this.runner.run(["systemctl", "is-active", this.name], { quiet: true });
    return result.stdout.trim() === "active";
  }

  async isEnabled(): Promise<boolean> {
    const result = await this.runner.run(["systemctl", "is-enabled", this.name], { quiet: true });
    return result.stdout.trim() === "enabled";
  }
}

export async function daemonReload(runner: CommandRunner = systemRunner): Promise<CommandResult> {
  return runner.run(["systemctl", "daemon-reload"]);
}
