import { UsageError, parseArgs, printHelp, printVersion } from "./cli.ts";
import type { ParsedArgs } from "./cli.ts";
import { runBootAccessPoint, runBootAdapters } from "./modes/boot.ts";
import { startServer } from "./modes/serve.ts";
import { runSetup } from "./modes/setup.ts";

function readArgs(): ParsedArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      printHelp();
      process.exit(1);
    }
    throw err;
  }
}

const args = readArgs();

if (args.showHelp) {
  printHelp();
} else if (args.showVersion) {
  printVersion();
} else {
  switch (args.command) {
    case "setup":
      await runSetup(args.configPath);
      break;
    case "boot-ap":
      process.exitCode = await runBootAccessPoint(args.configPath);
      break;
    case "boot-adapters":
      process.exitCode = await runBootAdapters(args.configPath);
      break;
    case "serve":
    case "auto":
      await startServer(args.configPath);
      break;
  }
}
