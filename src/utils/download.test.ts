import { describe, it, expect } from "vitest";
import { Downloader, quotePowerShell } from "./download";
import { InstallError } from "./errors";
import {
  createMockLogger,
  createMockProber,
  createMockRunner,
  exitWith,
  spawnError,
} from "./test-utils";

const ARTIFACT_URL = "http://cdn.example.test/releases/1.0.0/linux/BrowserOS_v1.0.0_x64.AppImage";
const DEST = "/tmp/browseros/downloads/BrowserOS_v1.0.0_x64.AppImage";

function captureError(fn: () => void): InstallError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InstallError) return error;
    throw error;
  }
  throw new Error("expected an InstallError");
}

describe("Downloader", () => {
  it("uses curl with three retries when available", () => {
    const runner = createMockRunner();
    const downloader = new Downloader(runner, createMockProber(["curl", "wget"]), createMockLogger(), "linux");

    downloader.download(ARTIFACT_URL, DEST);

    expect(runner.commandLines()).toEqual([`curl -fL --retry 3 -o ${DEST} ${ARTIFACT_URL}`]);
  });

  it("falls back to wget without curl", () => {
    const runner = createMockRunner();
    const downloader = new Downloader(runner, createMockProber(["wget"]), createMockLogger(), "darwin");

    downloader.download(ARTIFACT_URL, DEST);

    expect(runner.run).toHaveBeenCalledWith("wget", ["-O", DEST, ARTIFACT_URL]);
  });

  it("fails without running anything when neither tool exists", () => {
    const runner = createMockRunner();
    const downloader = new Downloader(runner, createMockProber([]), createMockLogger(), "linux");

    const error = captureError(() => downloader.download(ARTIFACT_URL, DEST));

    expect(error.kind).toBe("NO_FETCH_TOOL");
    expect(error.message).toBe("Neither curl nor wget is available in PATH");
    expect(runner.run).not.toHaveBeenCalled();
  });

  it("uses PowerShell on windows without probing", () => {
    const runner = createMockRunner();
    const prober = createMockProber(["curl"]);
    const downloader = new Downloader(runner, prober, createMockLogger(), "win32");

    downloader.download("https://example.test/a.exe", "C:\\dl\\a.exe");

    expect(prober.exists).not.toHaveBeenCalled();
    expect(runner.run).toHaveBeenCalledWith("powershell", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      "$ProgressPreference='SilentlyContinue'; Invoke-WebRequest -Uri 'https://example.test/a.exe' -OutFile 'C:\\dl\\a.exe'",
    ]);
  });

  it("escapes single quotes in the PowerShell script", () => {
    const runner = createMockRunner();
    const downloader = new Downloader(runner, createMockProber(), createMockLogger(), "win32");

    downloader.download("https://example.test/a.exe", "C:\\Users\\O'Brien\\.browseros\\downloads\\a.exe");

    expect(runner.run.mock.calls[0][1][3]).toBe(
      "$ProgressPreference='SilentlyContinue'; Invoke-WebRequest -Uri 'https://example.test/a.exe' -OutFile 'C:\\Users\\O''Brien\\.browseros\\downloads\\a.exe'"
    );
  });

  it("reports the url and exit status when the tool fails", () => {
    const runner = createMockRunner(() => exitWith(22));
    const downloader = new Downloader(runner, createMockProber(["curl"]), createMockLogger(), "linux");

    const error = captureError(() => downloader.download(ARTIFACT_URL, DEST));

    expect(error.kind).toBe("DOWNLOAD_FAILED");
    expect(error.message).toBe(`Download failed for ${ARTIFACT_URL} (exit status: 22)`);
  });

  it("reports a tool killed by a signal", () => {
    const runner = createMockRunner(() => ({ status: null, signal: "SIGINT" }));
    const downloader = new Downloader(runner, createMockProber(["wget"]), createMockLogger(), "linux");

    const error = captureError(() => downloader.download(ARTIFACT_URL, DEST));

    expect(error.message).toBe(`Download failed for ${ARTIFACT_URL} (signal SIGINT)`);
  });

  it("reports a tool that cannot be started", () => {
    const runner = createMockRunner(() => spawnError("spawn curl EACCES"));
    const downloader = new Downloader(runner, createMockProber(["curl"]), createMockLogger(), "linux");

    const error = captureError(() => downloader.download(ARTIFACT_URL, DEST));

    expect(error.kind).toBe("DOWNLOAD_FAILED");
    expect(error.message).toBe("Failed to run curl: spawn curl EACCES");
  });

  it("runs the fetch exactly once", () => {
    const runner = createMockRunner(() => exitWith(6));
    const downloader = new Downloader(runner, createMockProber(["curl"]), createMockLogger(), "linux");

    captureError(() => downloader.download(ARTIFACT_URL, DEST));

    expect(runner.run).toHaveBeenCalledTimes(1);
  });
});

describe("quotePowerShell", () => {
  it("wraps the value and doubles embedded quotes", () => {
    expect(quotePowerShell("plain")).toBe("'plain'");
    expect(quotePowerShell("it's 'here'")).toBe("'it''s ''here'''");
  });
});
