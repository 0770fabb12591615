/**
 * Fakes for the command, prober and logger seams.
 */
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { vi, type Mock } from "vitest";
import type { CommandOptions, CommandResult, CommandRunner, ToolProber } from "./command";
import type { Logger } from "./logger";

export const OK: CommandResult = { status: 0, signal: null };

export function exitWith(status: number): CommandResult {
  return { status, signal: null };
}

export function spawnError(message: string): CommandResult {
  return { status: null, signal: null, error: new Error(message) };
}

type RunFn = (command: string, args: readonly string[], options?: CommandOptions) => CommandResult;

export interface MockCommandRunner extends CommandRunner {
  run: Mock<RunFn>;
  /** "command arg1 arg2" for every call, in order */
  commandLines(): string[];
}

/**
 * Runner whose results come from handler. Commands the handler does not
 * answer succeed.
 */
export function createMockRunner(handler?: (command: string, args: readonly string[]) => CommandResult | undefined): MockCommandRunner {
  const run = vi.fn<RunFn>((command, args) => handler?.(command, args) ?? OK);
  return {
    run,
    commandLines: () => run.mock.calls.map(([command, args]) => [command, ...args].join(" ")),
  };
}

export interface MockToolProber extends ToolProber {
  exists: Mock<(command: string) => boolean>;
}

export function createMockProber(available: readonly string[] = []): MockToolProber {
  return {
    exists: vi.fn((command: string) => available.includes(command)),
  };
}

export interface MockLogger extends Logger {
  debug: Mock<(message: string) => void>;
  info: Mock<(message: string) => void>;
  warn: Mock<(message: string) => void>;
  error: Mock<(message: string) => void>;
}

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

export function createTempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), "browseros-test-"));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
