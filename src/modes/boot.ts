import { loadConfig, resolveConfigPath } from "../config.ts";
import { createServices } from "../services/index.ts";
import { createLogger, setLogLevel } from "../utils/logger.ts";

const log = createLogger("boot");

/** Exit codes for the boot unit: 0 ok, 1 failed, 2 readiness timeout (worth retrying). */
export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_NOT_READY = 2;

async function bootServices(configPath?: string) {
  const config = await loadConfig(configPath);
  setLogLevel(config.logLevel);
  return createServices(config, { configPath: resolveConfigPath(configPath) });
}

/** Runs the AP activation sequence; invoked by the boot unit. */
export async function runBootAccessPoint(configPath?: string): Promise<number> {
  const services = await bootServices(configPath);
  const result = await services.bootSequencer.run();
  if (result.ok) {
    for (const warning of result.warnings) log.warn(warning);
    return EXIT_OK;
  }
  log.error(result.error);
  return result.kind === "readiness-timeout" ? EXIT_NOT_READY : EXIT_FAILED;
}

/** Brings up the static profiles of adapters that were plugged in before boot. */
export async function runBootAdapters(configPath?: string): Promise<number> {
  const services = await bootServices(configPath);
  const result = await services.adapters.activateStaticProfiles();
  if (!result.ok) {
    log.error(result.error);
    return EXIT_FAILED;
  }
  for (const warning of result.warnings) log.warn(warning);
  log.info("USB adapter initialization complete");
  return EXIT_OK;
}
