import { homedir, tmpdir } from "os";
import { join } from "path";
import { describe, it, expect } from "vitest";
import { detectPlatform, getInstallRoot, isLinux } from "./platform";

describe("detectPlatform", () => {
  it("reads the running process", () => {
    expect(detectPlatform()).toEqual({ os: process.platform, arch: process.arch });
  });
});

describe("isLinux", () => {
  it("matches linux only", () => {
    expect(isLinux({ os: "linux", arch: "arm64" })).toBe(true);
    expect(isLinux({ os: "darwin", arch: "arm64" })).toBe(false);
  });
});

describe("getInstallRoot", () => {
  it("prefers the explicit directory", () => {
    expect(
      getInstallRoot({ installDir: "/opt/browseros", env: { BROWSEROS_HOME: "/srv/browseros" }, homeDir: "/home/test" })
    ).toBe("/opt/browseros");
  });

  it("uses BROWSEROS_HOME next", () => {
    expect(getInstallRoot({ env: { BROWSEROS_HOME: "/srv/browseros" }, homeDir: "/home/test" })).toBe("/srv/browseros");
  });

  it("defaults to .browseros in the home directory", () => {
    expect(getInstallRoot({ env: {}, homeDir: "/home/test" })).toBe(join("/home/test", ".browseros"));
  });

  it("falls back to the temp directory without a home directory", () => {
    expect(getInstallRoot({ env: {}, homeDir: "" })).toBe(join(tmpdir(), ".browseros"));
  });

  it("asks the OS for the home directory when none is given", () => {
    expect(getInstallRoot({ env: {} })).toBe(join(homedir(), ".browseros"));
  });
});
