import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { getExitCodeInfo, handleFatalError, isUserTermination, logExitCode } from "../src/error-handler.js";
import { ImageNotFoundError, extractErrorDetails } from "../src/errors.js";
import { enableQuietMode } from "../src/logger.js";

describe("exit codes", () => {
  it("describes known codes", () => {
    expect(getExitCodeInfo(137).name).toBe("OOM_KILLED");
    expect(getExitCodeInfo(125).severity).toBe("error");
  });

  it("describes unknown codes", () => {
    expect(getExitCodeInfo(42)).toEqual({
      code: 42,
      name: "UNKNOWN",
      description: "Exited with code 42",
      severity: "warn",
    });
  });

  it("treats SIGINT and SIGTERM as user termination", () => {
    expect(isUserTermination(130)).toBe(true);
    expect(isUserTermination(143)).toBe(true);
    expect(isUserTermination(1)).toBe(false);
  });
});

describe("logging", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stays silent for a zero exit code", () => {
    logExitCode(0);

    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).not.toHaveBeenCalled();
  });

  it("reports an error exit code with its context", () => {
    logExitCode(127, "docker");

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Command not found (docker)"));
  });

  it("prints plugin errors as their message and exits 1", () => {
    const codes: number[] = [];

    handleFatalError(new ImageNotFoundError("proj"), (code) => codes.push(code));

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Error: Unable to find image `proj` locally."));
    expect(codes).toEqual([1]);
  });

  it("flags anything else as unexpected", () => {
    const codes: number[] = [];

    handleFatalError(new TypeError("boom"), (code) => codes.push(code));

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Unexpected error: boom"));
    expect(codes).toEqual([1]);
  });

  // Quiet mode lasts for the rest of this file
  it("prints nothing in quiet mode", () => {
    enableQuietMode();

    handleFatalError(new Error("quiet"), () => {});

    expect(console.error).not.toHaveBeenCalled();
  });
});

describe("extractErrorDetails", () => {
  it("prefers stderr of a failed process", () => {
    const error = Object.assign(new Error("Command failed"), { stderr: "no such image" });

    expect(extractErrorDetails(error)).toBe("no such image");
  });

  it("truncates long messages", () => {
    expect(extractErrorDetails(new Error("x".repeat(20)), 5)).toBe("xxxxx");
  });
});
