import { mkdirSync } from "fs";
import { join } from "path";
import type { InstallResult, InstallerOptions, PlatformKey } from "../type";
import { resolveArtifact } from "./artifacts";
import { type CommandRunner, PathProber, SystemCommandRunner, type ToolProber } from "./command";
import { BROWSEROS_VERSION, CLI_NAME, EXECUTABLE_ENV_VAR } from "./constants";
import { installDependencies, resolveDependencies } from "./dependencies";
import { Downloader } from "./download";
import { InstallError, errorMessage } from "./errors";
import { selectPlatformInstaller } from "./installers";
import { type Logger, createLogger } from "./logger";
import { detectPlatform, getInstallRoot, isLinux } from "./platform";

/**
 * Collaborators of an install run. Everything defaults to the real host.
 */
export interface InstallerEnvironment {
  platform?: PlatformKey;
  runner?: CommandRunner;
  prober?: ToolProber;
  logger?: Logger;
  /** Receives the final report, one line per call */
  output?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

const WITH_DEPS_COMMAND = `${CLI_NAME} install --with-deps`;

export class BrowserOSInstaller {
  options: InstallerOptions;
  installRoot: string;
  private platform: PlatformKey;
  private runner: CommandRunner;
  private prober: ToolProber;
  private logger: Logger;
  private output: (line: string) => void;

  constructor(options: InstallerOptions = {}, environment: InstallerEnvironment = {}) {
    this.options = {
      withDeps: options.withDeps ?? false,
      installDir: options.installDir ?? undefined,
      logLevel: options.logLevel ?? "info",
    };

    this.logger =
      environment.logger ??
      createLogger({
        logLevel: this.options.logLevel,
        name: "BrowserOS",
      });

    this.platform = environment.platform ?? detectPlatform();
    this.runner = environment.runner ?? new SystemCommandRunner();
    this.prober = environment.prober ?? new PathProber(this.runner, this.platform.os);
    this.output = environment.output ?? ((line) => console.log(line));
    this.installRoot = getInstallRoot({
      installDir: this.options.installDir,
      env: environment.env,
      homeDir: environment.homeDir,
    });

    this.logger.debug(`Platform: ${this.platform.os} / ${this.platform.arch}`);
    this.logger.debug(`Install root: ${this.installRoot}`);
  }

  /**
   * Runs the whole pipeline. Throws InstallError on any fatal failure; a
   * failed dependency install is only a warning.
   */
  run(): InstallResult {
    const linux = isLinux(this.platform);

    if (linux) {
      if (this.options.withDeps) {
        this.installSystemDependencies();
      } else {
        this.logger.warn(`Linux detected. If browser fails to launch, run: ${WITH_DEPS_COMMAND}`);
      }
    }

    const artifact = resolveArtifact(this.platform, BROWSEROS_VERSION);
    if (!artifact) {
      throw new InstallError(
        "UNSUPPORTED_PLATFORM",
        `Unsupported platform for BrowserOS install: ${this.platform.os} / ${this.platform.arch}`
      );
    }

    const downloadsDir = join(this.installRoot, "downloads");
    try {
      mkdirSync(downloadsDir, { recursive: true });
    } catch (error) {
      throw new InstallError(
        "DIRECTORY_CREATION_FAILED",
        `Failed to create download directory ${downloadsDir}: ${errorMessage(error)}`
      );
    }

    const downloadPath = join(downloadsDir, artifact.fileName);
    this.logger.info(`Downloading BrowserOS ${BROWSEROS_VERSION}...`);
    new Downloader(this.runner, this.prober, this.logger, this.platform.os).download(
      artifact.downloadUrl,
      downloadPath
    );

    const installer = selectPlatformInstaller(this.platform.os, this.runner, this.logger);
    const executablePath = installer.install(downloadPath, this.installRoot);

    const result: InstallResult = { downloadedArtifactPath: downloadPath };
    if (executablePath) {
      result.installedExecutablePath = executablePath;
    }

    this.report(result, installer.manualInstructions());
    return result;
  }

  private installSystemDependencies(): void {
    this.logger.info("Installing system dependencies...");
    const profile = resolveDependencies(this.prober, this.runner);
    this.logger.debug(`Using ${profile.manager} for ${profile.packages.length} packages`);
    installDependencies(profile, this.runner, this.logger);
  }

  private report(result: InstallResult, manualInstructions: readonly string[]): void {
    this.output("BrowserOS package downloaded:");
    this.output(`  ${result.downloadedArtifactPath}`);

    if (result.installedExecutablePath) {
      this.output("BrowserOS executable ready:");
      this.output(`  ${result.installedExecutablePath}`);
      this.output("");
      this.output("Set this in your shell:");
      this.output(`  export ${EXECUTABLE_ENV_VAR}="${result.installedExecutablePath}"`);
    } else if (manualInstructions.length > 0) {
      this.output("");
      manualInstructions.forEach((line) => this.output(line));
    }

    if (isLinux(this.platform) && !this.options.withDeps) {
      this.output("");
      this.output("Note: If BrowserOS fails to start due to missing shared libraries, run:");
      this.output(`  ${WITH_DEPS_COMMAND}`);
    }
  }
}
