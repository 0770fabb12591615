import systemDependencies from "../data/system-dependencies.json";
import type { PackageManagerName, PackageManagerProfile } from "../type";
import { type CommandRunner, type ToolProber, describeStatus, isSuccess } from "./command";
import { InstallError } from "./errors";
import type { Logger } from "./logger";

/** Probe order. The first manager found wins. */
export const PACKAGE_MANAGERS: readonly PackageManagerName[] = ["apt-get", "dnf", "yum"];

const LEGACY_ALSA_PACKAGE = "libasound2";
// Ubuntu 24.04 and later ship the 64-bit time_t rename
const RENAMED_ALSA_PACKAGE = "libasound2t64";

export function packageExistsApt(runner: CommandRunner, pkg: string): boolean {
  return isSuccess(runner.run("apt-cache", ["show", pkg], { quiet: true }));
}

/**
 * Selects the system package manager and the shared libraries BrowserOS needs.
 * Throws UNSUPPORTED_PACKAGE_MANAGER when none of apt-get, dnf or yum exists.
 */
export function resolveDependencies(prober: ToolProber, runner: CommandRunner): PackageManagerProfile {
  const manager = PACKAGE_MANAGERS.find((candidate) => prober.exists(candidate));

  if (!manager) {
    throw new InstallError(
      "UNSUPPORTED_PACKAGE_MANAGER",
      "No supported package manager found (apt-get, dnf, or yum)"
    );
  }

  const packages = [...systemDependencies[manager]];

  if (manager === "apt-get" && packageExistsApt(runner, RENAMED_ALSA_PACKAGE)) {
    const index = packages.indexOf(LEGACY_ALSA_PACKAGE);
    if (index !== -1) {
      packages[index] = RENAMED_ALSA_PACKAGE;
    }
  }

  return { manager, packages };
}

export function buildInstallCommand(profile: PackageManagerProfile): string {
  const packages = profile.packages.join(" ");

  if (profile.manager === "apt-get") {
    return `sudo apt-get update && sudo apt-get install -y ${packages}`;
  }
  return `sudo ${profile.manager} install -y ${packages}`;
}

/**
 * Runs the install command once. Missing libraries only matter when the
 * browser starts, so a failure is logged as a warning and reported as false.
 */
export function installDependencies(
  profile: PackageManagerProfile,
  runner: CommandRunner,
  logger: Logger
): boolean {
  const command = buildInstallCommand(profile);
  logger.info(`Running: ${command}`);

  const result = runner.run("sh", ["-c", command]);

  if (isSuccess(result)) {
    logger.info("System dependencies installed");
    return true;
  }

  if (result.error) {
    logger.warn(`Could not run install command: ${describeStatus(result)}`);
  } else {
    logger.warn("Failed to install some dependencies. You may need to run manually with sudo.");
  }
  return false;
}
