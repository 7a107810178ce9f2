import chalk from "chalk";
import { Command } from "commander";
import { describe, it, expect, vi, beforeAll, afterEach } from "vitest";

import { registerValuesCommand, runValues } from "@/cli/commands/values.js";
import { IndexOutOfRangeError } from "@/lib/errors.js";
import { logger } from "@/lib/logger.js";

describe("values command", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    logger.configure({ level: "info" });
    vi.restoreAllMocks();
  });

  describe("runValues", () => {
    it("lists pairs ending with the original template", () => {
      const result = runValues("{A} {B}", ["1", "x"], { output: "terminal", jsonValues: true });
      expect(result).toEqual({
        success: true,
        data: "A = 1\nB = x\n{OriginalFormat} = {A} {B}",
      });
    });

    it("writes JSON pairs", () => {
      const result = runValues("{Items}", ["[1,2]"], { output: "json", jsonValues: true });
      expect(result.success && JSON.parse(result.data)).toEqual([
        { name: "Items", value: [1, 2] },
        { name: "{OriginalFormat}", value: "{Items}" },
      ]);
    });

    it("fails when there are fewer values than names", () => {
      const result = runValues("{A} {B}", ["1"], { output: "terminal", jsonValues: false });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(IndexOutOfRangeError);
      }
    });
  });

  describe("registerValuesCommand", () => {
    it("prints the pairs", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const program = new Command();
      registerValuesCommand(program);

      program.parse(["values", "Hi {Name}", "Ann"], { from: "user" });

      expect(log).toHaveBeenCalledWith("Name = Ann\n{OriginalFormat} = Hi {Name}");
    });
  });
});
