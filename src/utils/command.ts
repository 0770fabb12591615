import { spawnSync } from "child_process";

export interface CommandOptions {
  /** Discard stdout and stderr instead of passing them through to the terminal */
  readonly quiet?: boolean;
}

/**
 * Outcome of one external command. Exit status is the only success signal.
 */
export interface CommandResult {
  /** Exit code, or null when the process was killed or never started */
  readonly status: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned (ENOENT, EACCES) */
  readonly error?: Error;
}

/**
 * Runs external executables to completion. Injected everywhere a tool is
 * invoked so tests never spawn a real process.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): CommandResult;
}

/**
 * Answers whether a named executable is on the search path.
 */
export interface ToolProber {
  exists(command: string): boolean;
}

export function isSuccess(result: CommandResult): boolean {
  return result.error === undefined && result.status === 0;
}

export function describeStatus(result: CommandResult): string {
  if (result.error) {
    return result.error.message;
  }
  if (result.signal) {
    return `signal ${result.signal}`;
  }
  return `exit status: ${result.status}`;
}

export class SystemCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): CommandResult {
    const result = spawnSync(command, [...args], {
      stdio: options.quiet ? "ignore" : "inherit",
    });

    return {
      status: result.status,
      signal: result.signal,
      error: result.error,
    };
  }
}

export class PathProber implements ToolProber {
  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  exists(command: string): boolean {
    const locator = this.platform === "win32" ? "where" : "which";
    return isSuccess(this.runner.run(locator, [command], { quiet: true }));
  }
}
