import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new Logger("warn");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] w");
  });

  it("always reports errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new Logger("error").error("failed");
    expect(error).toHaveBeenCalledWith("[ERROR] failed");
  });
});
