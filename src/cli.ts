#!/usr/bin/env node
import yargs from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { installCommand } from "./install";
import { CLI_NAME, INSTALL_ROOT_ENV_VAR } from "./utils/constants";
import { errorMessage } from "./utils/errors";
import { createLogger } from "./utils/logger";

// Reports fatal errors only. The install run logs through its own logger,
// which receives --logLevel from installCommand.
const logger = createLogger({ name: "CLI" });

function exitWithError(message: string): never {
  logger.error(message);
  process.exit(1);
}

yargs(hideBin(process.argv))
  .scriptName(CLI_NAME)
  .middleware((argv) => {
    if (argv.logLevel) {
      logger.level = String(argv.logLevel);
      logger.debug(`Log level set to ${argv.logLevel}`);
    }
  })
  .command(
    "install",
    "Download BrowserOS and install it for this machine",
    (yargs) =>
      yargs
        .option("withDeps", {
          alias: "with-deps",
          describe: "Also install the system libraries BrowserOS needs (Linux only)",
          type: "boolean",
          default: false,
        })
        .option("installDir", {
          alias: "install-dir",
          describe: `Directory to install into (defaults to $${INSTALL_ROOT_ENV_VAR} or ~/.browseros)`,
          type: "string",
        })
        .option("logLevel", {
          describe: "Log level: trace, debug, info, warn, error, fatal",
          type: "string",
          choices: ["trace", "debug", "info", "warn", "error", "fatal"],
          default: "info",
        }),
    (argv) => {
      // yargs rethrows synchronous handler errors instead of calling .fail()
      try {
        installCommand(argv);
      } catch (error) {
        exitWithError(errorMessage(error));
      }
    }
  )
  .fail((msg, err) => {
    exitWithError(err ? err.message : msg);
  })
  .demandCommand(1, "You need at least one command before moving on")
  .strict()
  .help()
  .parse();
