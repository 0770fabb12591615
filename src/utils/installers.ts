import { copyFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { join } from "path";
import {
  APP_BUNDLE_NAME,
  EXECUTABLE_ENV_VAR,
  EXECUTABLE_NAME,
  WINDOWS_DEFAULT_EXECUTABLE,
} from "./constants";
import { type CommandRunner, describeStatus, isSuccess } from "./command";
import { InstallError, errorMessage } from "./errors";
import type { Logger } from "./logger";

/**
 * Turns a downloaded artifact into something the user can run.
 */
export interface PlatformInstaller {
  /**
   * Unpacks or copies the artifact below installRoot.
   * Returns the executable path, or undefined when the user has to finish the
   * install by hand.
   */
  install(artifactPath: string, installRoot: string): string | undefined;

  /** Follow-up lines printed when install() yields no executable */
  manualInstructions(): readonly string[];
}

/**
 * macOS: mounts the disk image, copies BrowserOS.app next to it and always
 * detaches the image again.
 */
export class DmgInstaller implements PlatformInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  install(dmgPath: string, installRoot: string): string {
    const mountDir = join(installRoot, "mount");
    const appTarget = join(installRoot, APP_BUNDLE_NAME);

    try {
      mkdirSync(installRoot, { recursive: true });
    } catch (error) {
      throw new InstallError(
        "DIRECTORY_CREATION_FAILED",
        `Failed to prepare BrowserOS directory ${installRoot}: ${errorMessage(error)}`
      );
    }

    if (existsSync(mountDir)) {
      // Left over from an interrupted run. It may no longer be mounted.
      this.logger.debug(`Removing stale mount point ${mountDir}`);
      this.runner.run("hdiutil", ["detach", mountDir, "-force"], { quiet: true });
      this.removeMountDir(mountDir);
    }

    try {
      mkdirSync(mountDir, { recursive: true });
    } catch (error) {
      throw new InstallError(
        "DIRECTORY_CREATION_FAILED",
        `Failed to create mount directory ${mountDir}: ${errorMessage(error)}`
      );
    }

    this.logger.info(`Mounting ${dmgPath}`);
    const attach = this.runner.run("hdiutil", ["attach", "-nobrowse", "-quiet", "-mountpoint", mountDir, dmgPath]);
    if (!isSuccess(attach)) {
      this.removeMountDir(mountDir);
      throw new InstallError("MOUNT_FAILED", "Failed to mount BrowserOS DMG");
    }

    try {
      return this.copyBundle(mountDir, appTarget);
    } finally {
      this.runner.run("hdiutil", ["detach", mountDir, "-quiet"], { quiet: true });
      this.removeMountDir(mountDir);
    }
  }

  manualInstructions(): readonly string[] {
    return [];
  }

  /** Never throws: a volume that failed to detach cannot be removed (EBUSY). */
  private removeMountDir(mountDir: string): void {
    try {
      rmSync(mountDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.debug(`Could not remove mount point ${mountDir}: ${errorMessage(error)}`);
    }
  }

  private copyBundle(mountDir: string, appTarget: string): string {
    const appInDmg = join(mountDir, APP_BUNDLE_NAME);
    if (!existsSync(appInDmg)) {
      throw new InstallError("BUNDLE_NOT_FOUND", `${APP_BUNDLE_NAME} not found in mounted DMG: ${mountDir}`);
    }

    if (existsSync(appTarget)) {
      try {
        rmSync(appTarget, { recursive: true, force: true });
      } catch (error) {
        throw new InstallError(
          "COPY_FAILED",
          `Failed to remove previous ${APP_BUNDLE_NAME} at ${appTarget}: ${errorMessage(error)}`
        );
      }
    }

    this.logger.info(`Copying ${APP_BUNDLE_NAME} to ${appTarget}`);
    const copy = this.runner.run("cp", ["-R", appInDmg, appTarget]);
    if (copy.error) {
      throw new InstallError("COPY_FAILED", `Failed to copy ${APP_BUNDLE_NAME}: ${describeStatus(copy)}`);
    }
    if (copy.status !== 0) {
      throw new InstallError("COPY_FAILED", `Failed to copy ${APP_BUNDLE_NAME} from DMG`);
    }

    const executable = join(appTarget, "Contents", "MacOS", EXECUTABLE_NAME);
    if (!existsSync(executable)) {
      throw new InstallError("EXECUTABLE_NOT_FOUND", `Installed BrowserOS executable not found: ${executable}`);
    }

    return executable;
  }
}

/**
 * Linux: the AppImage is self-contained, so it only needs copying to a fixed
 * name and the executable bit.
 */
export class AppImageInstaller implements PlatformInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  install(appImagePath: string, installRoot: string): string {
    const binDir = join(installRoot, "bin");
    try {
      mkdirSync(binDir, { recursive: true });
    } catch (error) {
      throw new InstallError(
        "DIRECTORY_CREATION_FAILED",
        `Failed to create BrowserOS bin directory ${binDir}: ${errorMessage(error)}`
      );
    }

    const executable = join(binDir, EXECUTABLE_NAME);
    try {
      copyFileSync(appImagePath, executable);
    } catch (error) {
      throw new InstallError(
        "COPY_FAILED",
        `Failed to install BrowserOS AppImage to ${executable}: ${errorMessage(error)}`
      );
    }
    this.logger.debug(`Copied ${appImagePath} to ${executable}`);

    const chmod = this.runner.run("chmod", ["+x", executable]);
    if (chmod.error) {
      throw new InstallError(
        "PERMISSION_CHANGE_FAILED",
        `Failed to run chmod +x on ${executable}: ${describeStatus(chmod)}`
      );
    }
    if (chmod.status !== 0) {
      throw new InstallError(
        "PERMISSION_CHANGE_FAILED",
        `Failed to mark BrowserOS executable as runnable: ${executable}`
      );
    }

    return executable;
  }

  manualInstructions(): readonly string[] {
    return [];
  }
}

/**
 * Windows and unmodeled systems: the artifact is left where it was downloaded.
 */
export class ManualInstaller implements PlatformInstaller {
  constructor(private readonly instructions: readonly string[] = []) {}

  install(): undefined {
    return undefined;
  }

  manualInstructions(): readonly string[] {
    return this.instructions;
  }
}

export function selectPlatformInstaller(
  os: NodeJS.Platform,
  runner: CommandRunner,
  logger: Logger
): PlatformInstaller {
  switch (os) {
    case "darwin":
      return new DmgInstaller(runner, logger);
    case "linux":
      return new AppImageInstaller(runner, logger);
    case "win32":
      return new ManualInstaller([
        "Run the downloaded installer, then set:",
        `  set ${EXECUTABLE_ENV_VAR}=${WINDOWS_DEFAULT_EXECUTABLE}`,
      ]);
    default:
      return new ManualInstaller();
  }
}
