import type { ArgumentsCamelCase } from "yargs";
import type { InstallResult, InstallerOptions } from "./type";
import { BrowserOSInstaller, type InstallerEnvironment } from "./utils/browseros";
import { createLogger } from "./utils/logger";

export function installCommand(
  argv: ArgumentsCamelCase<{
    withDeps?: boolean;
    installDir?: string;
    logLevel?: string;
  }>,
  environment: InstallerEnvironment = {}
): InstallResult {
  const logger =
    environment.logger ??
    createLogger({
      logLevel: argv.logLevel || "info",
      name: "Install",
    });

  logger.debug(`Command arguments: ${JSON.stringify(argv)}`);

  const installerOptions: InstallerOptions = {
    withDeps: argv.withDeps ?? false,
    installDir: argv.installDir,
    logLevel: argv.logLevel || "info",
  };

  const installer = new BrowserOSInstaller(installerOptions, { ...environment, logger });
  const result = installer.run();

  logger.info("BrowserOS install finished");
  return result;
}
