import { describe, it, expect, vi } from "vitest";
import { createLogger, isLogLevel } from "../logger.js";

describe("createLogger", () => {
  it("writes messages at or above the configured level", () => {
    const write = vi.fn();
    const logger = createLogger({ level: "warn", write });

    logger.debug("hidden");
    logger.info("hidden");
    logger.success("hidden");
    logger.warn("careful");
    logger.error("broken");

    expect(write.mock.calls.map(([, level]) => level)).toEqual(["warn", "error"]);
    expect(write.mock.calls[0]?.[0]).toContain("careful");
    expect(write.mock.calls[1]?.[0]).toContain("broken");
  });

  it("reports success at info level", () => {
    const write = vi.fn();
    createLogger({ level: "info", write }).success("saved");

    expect(write).toHaveBeenCalledWith(expect.stringContaining("saved"), "info");
  });

  it("writes nothing when silent", () => {
    const write = vi.fn();
    const logger = createLogger({ level: "silent", write });

    logger.error("nobody hears this");

    expect(write).not.toHaveBeenCalled();
  });

  it("recognises level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
