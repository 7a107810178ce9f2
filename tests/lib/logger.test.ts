import chalk from "chalk";
import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";

import { logger } from "@/lib/logger.js";

describe("logger", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logger.configure({ level: "info", prefix: "", format: "text" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.configure({ level: "info", prefix: "", format: "text" });
  });

  it("renders message templates", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    logger.info("User {UserId} logged in from {IpAddress}", 42, "10.0.0.1");
    expect(info).toHaveBeenCalledWith("User 42 logged in from 10.0.0.1");
  });

  it("writes a template without arguments as-is", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    logger.info("Nothing {Here} to fill");
    expect(info).toHaveBeenCalledWith("Nothing {Here} to fill");
  });

  it("filters by level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.debug("Hidden {Value}", 1);
    expect(debug).not.toHaveBeenCalled();

    logger.configure({ level: "debug" });
    logger.debug("Shown {Value}", 1);
    expect(debug).toHaveBeenCalledWith("Shown 1");

    logger.configure({ level: "silent" });
    logger.error("Never {Value}", 1);
    expect(error).not.toHaveBeenCalled();
  });

  it("writes success messages at info level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    logger.success("Rendered {Count} templates", 3);
    expect(info).toHaveBeenCalledWith("Rendered 3 templates");
  });

  it("prefixes child loggers", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.configure({ prefix: "[app]" });
    logger.child("[cli]").warn("Skipped {Step}", "parse");
    expect(warn).toHaveBeenCalledWith("[app] [cli] Skipped parse");
  });

  describe("json format", () => {
    it("writes the message and every field", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      logger.configure({ format: "json" });
      logger.warn("Disk {Percent:P0} full", 0.9);

      expect(warn).toHaveBeenCalledTimes(1);
      const line = String(warn.mock.calls[0]?.[0]);
      expect(JSON.parse(line)).toEqual({
        level: "warn",
        message: "Disk 90 % full",
        Percent: 0.9,
        "{OriginalFormat}": "Disk {Percent:P0} full",
      });
    });

    it("includes the prefix and writes bigints as strings", () => {
      const info = vi.spyOn(console, "info").mockImplementation(() => {});
      logger.configure({ format: "json", prefix: "[app]" });
      logger.info("Order {Id}", 5n);

      const line = String(info.mock.calls[0]?.[0]);
      expect(JSON.parse(line)).toEqual({
        level: "info",
        prefix: "[app]",
        message: "Order 5",
        Id: "5",
        "{OriginalFormat}": "Order {Id}",
      });
    });

    it("keeps its own keys when template fields share their names", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      logger.configure({ format: "json", prefix: "[app]" });
      logger.warn("Set {level} to {message} for {prefix}", "debug", "hi", "x");

      const line = String(warn.mock.calls[0]?.[0]);
      expect(JSON.parse(line)).toEqual({
        level: "warn",
        prefix: "[app]",
        message: "Set debug to hi for x",
        "{OriginalFormat}": "Set {level} to {message} for {prefix}",
      });
    });
  });
});
