import { describe, it, expect, afterEach, vi } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("enables levels at or above the configured one", () => {
    const logger = new Logger("warn");
    expect(logger.isEnabled("debug")).toBe(false);
    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("warn")).toBe(true);
    expect(logger.isEnabled("error")).toBe(true);
  });

  it("drops messages below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = new Logger("warn");
    logger.info("quiet");
    logger.warn("loud");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
