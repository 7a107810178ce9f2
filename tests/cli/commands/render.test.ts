import chalk from "chalk";
import { Command } from "commander";
import { describe, it, expect, vi, beforeAll, afterEach } from "vitest";

import { registerRenderCommand, runRender } from "@/cli/commands/render.js";
import { FormatError } from "@/lib/errors.js";
import { logger } from "@/lib/logger.js";

describe("render command", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    logger.configure({ level: "info" });
    vi.restoreAllMocks();
  });

  describe("runRender", () => {
    it("renders raw string values", () => {
      const result = runRender("User {UserId} from {Ip}", ["42", "10.0.0.1"], {
        output: "terminal",
        jsonValues: false,
      });
      expect(result).toEqual({ success: true, data: "User 42 from 10.0.0.1" });
    });

    it("applies format strings to JSON values", () => {
      const result = runRender("{Count:D3} items", ["7"], { output: "terminal", jsonValues: true });
      expect(result).toEqual({ success: true, data: "007 items" });
    });

    it("leaves strings unformatted", () => {
      const result = runRender("{Count:D3} items", ["7"], { output: "terminal", jsonValues: false });
      expect(result).toEqual({ success: true, data: "7 items" });
    });

    it("renders null and arrays from JSON values", () => {
      const result = runRender("{A} [{B}]", ["null", "[1,2]"], { output: "terminal", jsonValues: true });
      expect(result).toEqual({ success: true, data: "(null) [1, 2]" });
    });

    it("wraps the message in JSON output", () => {
      const result = runRender("Hi {Name}", ["Ann"], { output: "json", jsonValues: false });
      expect(result.success && JSON.parse(result.data)).toEqual({ message: "Hi Ann" });
    });

    it("fails when a value is missing", () => {
      const result = runRender("{A} {B}", ["1"], { output: "terminal", jsonValues: false });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(FormatError);
      }
    });
  });

  describe("registerRenderCommand", () => {
    it("adds the render command", () => {
      const program = new Command();
      registerRenderCommand(program);

      const command = program.commands.find((candidate) => candidate.name() === "render");
      expect(command?.description()).toBe("Render a message template with positional values");
    });

    it("prints the rendered message", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const program = new Command();
      registerRenderCommand(program);

      program.parse(["render", "{A} and {B}", "x", "y"], { from: "user" });

      expect(log).toHaveBeenCalledWith("x and y");
    });
  });
});
