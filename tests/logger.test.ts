import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, getLogLevel, logger, serializeLogData, setLogLevel } from "@/lib/logger";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("writes data as indented JSON", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    logger.info("Chart built", { houses: 12 });

    expect(info).toHaveBeenCalledWith("Chart built", '{\n  "houses": 12\n}');
  });

  it("writes the message alone without data", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.warn("Ascendant missing");

    expect(warn).toHaveBeenCalledWith("Ascendant missing");
  });

  it("drops messages below the threshold", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.debug("hidden");
    expect(debug).not.toHaveBeenCalled();

    setLogLevel("silent");
    logger.error("also hidden");
    expect(error).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe("silent");
  });

  it("keeps a pinned level apart from the shared threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const quiet = createLogger("error");
    const verbose = createLogger("debug");

    quiet.warn("dropped");
    expect(warn).not.toHaveBeenCalled();

    setLogLevel("silent");
    verbose.warn("kept");
    expect(warn).toHaveBeenCalledWith("kept");
    expect(getLogLevel()).toBe("silent");
  });

  it("reduces errors to message and stack", () => {
    const failure = new Error("boom");
    expect(JSON.parse(serializeLogData(failure))).toEqual({ message: "boom", stack: failure.stack });
  });
});
