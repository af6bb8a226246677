import { execa, ExecaError } from "execa";
import { createLogger } from "./logger.ts";

const log = createLogger("shell");

export class ShellError extends Error {
  constructor(
    public command: string,
    public exitCode: number,
    public stderr: string,
  ) {
    super(`Command failed (exit ${exitCode}): ${command}\n${stderr}`);
    this.name = "ShellError";
  }
}

export interface CommandResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Failure is an expected answer (existence probes); log it at debug level only. */
  quiet?: boolean;
}

export interface CommandRunner {
  run(command: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export class SystemCommandRunner implements CommandRunner {
  async run(command: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const [file, ...args] = command;
    if (!file) {
      throw new Error("Empty command");
    }

    let result: CommandResult;
    try {
      const proc = await execa(file, args);
      result = { ok: true, exitCode: 0, stdout: proc.stdout.trim(), stderr: proc.stderr.trim() };
    } catch (err) {
      if (!(err instanceof ExecaError)) throw err;
      result = {
        ok: false,
        exitCode: err.exitCode ?? -1,
        stdout: String(err.stdout ?? "").trim(),
        stderr: String(err.stderr ?? "").trim() || err.shortMessage,
      };
    }

    if (!result.ok) {
      const message = `Command failed: ${command.join(" ")}: ${result.stderr}`;
      if (options.quiet) {
        log.debug(message);
      } else {
        log.error(message);
      }
    }
    return result;
  }
}

export const systemRunner: CommandRunner = new SystemCommandRunner();

export async function exec(command: string[], runner: CommandRunner = systemRunner): Promise<string> {
  const result = await runner.run(command);
  if (!result.ok) {
    throw new ShellError(command.join(" "), result.exitCode, result.stderr);
  }
  return result.stdout;
}
