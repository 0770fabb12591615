import { type CommandRunner, type ToolProber, describeStatus } from "./command";
import { InstallError } from "./errors";
import type { Logger } from "./logger";

const CURL_RETRIES = 3;

/** Single-quoted PowerShell literal; ' is escaped by doubling it. */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

interface FetchInvocation {
  tool: string;
  command: string;
  args: string[];
}

/**
 * Fetches a file through whichever external tool the host offers:
 * PowerShell on Windows, otherwise curl (retrying) and then wget.
 */
export class Downloader {
  constructor(
    private readonly runner: CommandRunner,
    private readonly prober: ToolProber,
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  download(url: string, destination: string): void {
    const invocation = this.selectInvocation(url, destination);
    this.logger.debug(`Downloading ${url} with ${invocation.tool}`);

    const result = this.runner.run(invocation.command, invocation.args);

    if (result.error) {
      throw new InstallError("DOWNLOAD_FAILED", `Failed to run ${invocation.tool}: ${describeStatus(result)}`);
    }
    if (result.status !== 0) {
      throw new InstallError("DOWNLOAD_FAILED", `Download failed for ${url} (${describeStatus(result)})`);
    }

    this.logger.debug(`Saved ${url} to ${destination}`);
  }

  private selectInvocation(url: string, destination: string): FetchInvocation {
    if (this.platform === "win32") {
      const script = `$ProgressPreference='SilentlyContinue'; Invoke-WebRequest -Uri ${quotePowerShell(url)} -OutFile ${quotePowerShell(destination)}`;
      return {
        tool: "PowerShell download",
        command: "powershell",
        args: ["-NoProfile", "-NonInteractive", "-Command", script],
      };
    }

    if (this.prober.exists("curl")) {
      return {
        tool: "curl",
        command: "curl",
        args: ["-fL", "--retry", String(CURL_RETRIES), "-o", destination, url],
      };
    }

    if (this.prober.exists("wget")) {
      return {
        tool: "wget",
        command: "wget",
        args: ["-O", destination, url],
      };
    }

    throw new InstallError("NO_FETCH_TOOL", "Neither curl nor wget is available in PATH");
  }
}
