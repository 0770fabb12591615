import { homedir, tmpdir } from "os";
import { join } from "path";
import type { PlatformKey } from "../type";
import { INSTALL_DIR_NAME, INSTALL_ROOT_ENV_VAR } from "./constants";

export function detectPlatform(): PlatformKey {
  return { os: process.platform, arch: process.arch };
}

export function isLinux(platform: PlatformKey): boolean {
  return platform.os === "linux";
}

/**
 * Directory that holds downloads, the transient mount point and the installed
 * browser. Precedence: explicit option, BROWSEROS_HOME, home directory, temp
 * directory.
 */
export function getInstallRoot(
  options: { installDir?: string; env?: NodeJS.ProcessEnv; homeDir?: string } = {}
): string {
  if (options.installDir) {
    return options.installDir;
  }

  const env = options.env ?? process.env;
  const fromEnv = env[INSTALL_ROOT_ENV_VAR];
  if (fromEnv) {
    return fromEnv;
  }

  const home = options.homeDir ?? safeHomedir();
  return join(home || tmpdir(), INSTALL_DIR_NAME);
}

function safeHomedir(): string {
  try {
    return homedir();
  } catch {
    // homedir() throws when the passwd entry is missing
    return "";
  }
}
