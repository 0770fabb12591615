/**
 * Failure kinds raised by the install pipeline.
 */
export type InstallErrorKind =
  // Resolution
  | "UNSUPPORTED_PLATFORM"
  | "UNSUPPORTED_PACKAGE_MANAGER"
  // Filesystem
  | "DIRECTORY_CREATION_FAILED"
  // Download
  | "NO_FETCH_TOOL"
  | "DOWNLOAD_FAILED"
  // Platform install
  | "MOUNT_FAILED"
  | "BUNDLE_NOT_FOUND"
  | "COPY_FAILED"
  | "EXECUTABLE_NOT_FOUND"
  | "PERMISSION_CHANGE_FAILED";

/**
 * Fatal error of an install run. The message names the failing path, URL or
 * command and is shown to the user as is.
 *
 * @example
 * ```typescript
 * throw new InstallError("MOUNT_FAILED", "Failed to mount BrowserOS DMG");
 * ```
 */
export class InstallError extends Error {
  readonly name = "InstallError";

  constructor(
    readonly kind: InstallErrorKind,
    message: string
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isInstallError(error: unknown): error is InstallError {
  return error instanceof InstallError;
}

export function isInstallErrorOfKind(error: unknown, kind: InstallErrorKind): error is InstallError {
  return isInstallError(error) && error.kind === kind;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
