import { describe, it, expect, afterEach, vi } from "vitest";
import { createConsoleLogger } from "./logger.js";

describe("createConsoleLogger()", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes each level and component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("SessionManager");

    logger.info("ready");
    logger.warn("slow frame", 42);
    logger.error("failed");

    expect(log).toHaveBeenCalledWith("[INFO] [SessionManager] ready");
    expect(warn).toHaveBeenCalledWith("[WARN] [SessionManager] slow frame", 42);
    expect(error).toHaveBeenCalledWith("[ERROR] [SessionManager] failed");
  });
});
