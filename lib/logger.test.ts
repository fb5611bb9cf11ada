import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "./logger";

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("scoring", "debug").warn("careful", { id: "p1" });

    expect(warn).toHaveBeenCalledWith("[scoring]", "careful", { id: "p1" });
  });

  it("drops messages below a pinned level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("server", "warn");

    log.info("hidden");
    log.error("shown");

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[server]", "shown");
  });

  it("follows the process-wide level when not pinned", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("scoring");

    setLogLevel("info");
    log.debug("first");
    setLogLevel("debug");
    log.debug("second");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[scoring]", "second");
  });
});
