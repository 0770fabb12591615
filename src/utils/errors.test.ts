import { describe, it, expect } from "vitest";
import { InstallError, errorMessage, isInstallError, isInstallErrorOfKind } from "./errors";

describe("InstallError", () => {
  it("keeps kind and message", () => {
    const error = new InstallError("COPY_FAILED", "Failed to copy BrowserOS.app from DMG");

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("InstallError");
    expect(error.kind).toBe("COPY_FAILED");
    expect(error.message).toBe("Failed to copy BrowserOS.app from DMG");
  });

  it("is recognized by the guards", () => {
    const error = new InstallError("MOUNT_FAILED", "Failed to mount BrowserOS DMG");

    expect(isInstallError(error)).toBe(true);
    expect(isInstallError(new Error("other"))).toBe(false);
    expect(isInstallErrorOfKind(error, "MOUNT_FAILED")).toBe(true);
    expect(isInstallErrorOfKind(error, "COPY_FAILED")).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("EACCES: permission denied"))).toBe("EACCES: permission denied");
    expect(errorMessage("plain")).toBe("plain");
  });
});
