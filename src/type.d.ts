export type PackageManagerName = "apt-get" | "dnf" | "yum";

export interface PlatformKey {
  os: NodeJS.Platform;
  arch: NodeJS.Architecture;
}

export interface ArtifactDescriptor {
  downloadUrl: string;
  fileName: string;
}

export interface PackageManagerProfile {
  manager: PackageManagerName;
  packages: string[];
}

export interface InstallResult {
  downloadedArtifactPath: string;
  installedExecutablePath?: string;
}

export interface InstallerOptions {
  withDeps?: boolean;
  installDir?: string;
  logLevel?: string;
}
