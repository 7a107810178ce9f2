import chalk from "chalk";
import { describe, it, expect, beforeAll } from "vitest";

import {
  formatError,
  formatInspection,
  formatLogValues,
  formatRendered,
  isValidOutputFormat,
} from "@/cli/formatters.js";
import { FormatError } from "@/lib/errors.js";

describe("CLI formatters", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe("isValidOutputFormat", () => {
    it("accepts terminal and json only", () => {
      expect(isValidOutputFormat("terminal")).toBe(true);
      expect(isValidOutputFormat("json")).toBe(true);
      expect(isValidOutputFormat("xml")).toBe(false);
    });
  });

  describe("formatRendered", () => {
    it("prints the message or wraps it in JSON", () => {
      expect(formatRendered("User 42", "terminal")).toBe("User 42");
      expect(formatRendered("User 42", "json")).toBe('{\n  "message": "User 42"\n}');
    });
  });

  describe("formatInspection", () => {
    const inspection = {
      originalFormat: "{A} {B:F1}",
      canonicalFormat: "{0} {1:F1}",
      valueNames: ["A", "B"],
    };

    it("lists names with their positions", () => {
      expect(formatInspection(inspection, "terminal")).toBe(
        ["Template:  {A} {B:F1}", "Canonical: {0} {1:F1}", "Names (2): {0} A, {1} B"].join("\n")
      );
    });

    it("marks templates without names", () => {
      const output = formatInspection(
        { originalFormat: "plain", canonicalFormat: "plain", valueNames: [] },
        "terminal"
      );
      expect(output.split("\n")[2]).toBe("Names (0): (none)");
    });

    it("writes JSON", () => {
      expect(JSON.parse(formatInspection(inspection, "json"))).toEqual(inspection);
    });
  });

  describe("formatLogValues", () => {
    const pairs = [
      ["A", 1],
      ["B", null],
      ["{OriginalFormat}", "{A} {B}"],
    ] as const;

    it("prints one pair per line", () => {
      expect(formatLogValues(pairs, "terminal")).toBe("A = 1\nB = (null)\n{OriginalFormat} = {A} {B}");
    });

    it("writes JSON with values kept as-is", () => {
      expect(JSON.parse(formatLogValues(pairs, "json"))).toEqual([
        { name: "A", value: 1 },
        { name: "B", value: null },
        { name: "{OriginalFormat}", value: "{A} {B}" },
      ]);
    });

    it("writes bigints as strings in JSON", () => {
      expect(JSON.parse(formatLogValues([["Id", 7n]], "json"))).toEqual([{ name: "Id", value: "7" }]);
    });
  });

  describe("formatError", () => {
    it("includes the error code when there is one", () => {
      expect(formatError(new FormatError("bad item"))).toBe("Error [FORMAT_ERROR]: bad item");
      expect(formatError(new Error("plain"))).toBe("Error: plain");
    });
  });
});
