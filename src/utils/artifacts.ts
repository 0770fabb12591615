import type { ArtifactDescriptor, PlatformKey } from "../type";
import { BROWSEROS_VERSION, CDN_BASE_URL } from "./constants";

type ArtifactSlot = "macosArm64" | "macosX64" | "macosUniversal" | "windows" | "linux";

function descriptor(version: string, folder: string, suffix: string): ArtifactDescriptor {
  const fileName = `BrowserOS_v${version}_${suffix}`;
  return {
    downloadUrl: `${CDN_BASE_URL}/${version}/${folder}/${fileName}`,
    fileName,
  };
}

/**
 * Every published artifact of a release. Only the version varies.
 */
export function buildArtifactTable(version: string): Record<ArtifactSlot, ArtifactDescriptor> {
  return {
    macosArm64: descriptor(version, "macos", "arm64.dmg"),
    macosX64: descriptor(version, "macos", "x64.dmg"),
    macosUniversal: descriptor(version, "macos", "universal.dmg"),
    windows: descriptor(version, "win", "x64_installer.exe"),
    linux: descriptor(version, "linux", "x64.AppImage"),
  };
}

/**
 * Picks the artifact for a platform. macOS falls back to the universal image
 * for unknown architectures; Windows and Linux ship one artifact each.
 * Returns undefined for any other OS.
 */
export function resolveArtifact(
  platform: PlatformKey,
  version: string = BROWSEROS_VERSION
): ArtifactDescriptor | undefined {
  const table = buildArtifactTable(version);

  switch (platform.os) {
    case "darwin":
      if (platform.arch === "arm64") return table.macosArm64;
      if (platform.arch === "x64") return table.macosX64;
      return table.macosUniversal;
    case "win32":
      return table.windows;
    case "linux":
      return table.linux;
    default:
      return undefined;
  }
}
