import { describe, it, expect } from "vitest";

import { formatComposite, readFormatItem } from "@/format/index.js";
import { FormatError } from "@/lib/errors.js";

describe("readFormatItem", () => {
  it("reads index, alignment and format string", () => {
    expect(readFormatItem("{12,-3:N1}", 0)).toEqual({
      index: 12,
      alignment: -3,
      formatString: "N1",
      end: 9,
    });
  });

  it("reads a bare index", () => {
    expect(readFormatItem("x{0}", 1)).toEqual({
      index: 0,
      alignment: 0,
      formatString: undefined,
      end: 3,
    });
  });

  it("allows spaces around the alignment", () => {
    expect(readFormatItem("{0 , 4 }", 0)).toMatchObject({ index: 0, alignment: 4, end: 7 });
  });

  it.each(["{abc}", "{}", "{0", "{0,}", "{0,x}", "{0:{x}", "{0 1}"])("rejects %j", (text) => {
    expect(readFormatItem(text, 0)).toBeUndefined();
  });
});

describe("formatComposite", () => {
  it("substitutes arguments by index", () => {
    expect(formatComposite("{0} and {1}", ["a", "b"])).toBe("a and b");
    expect(formatComposite("{1} before {0}", ["a", "b"])).toBe("b before a");
  });

  it("repeats an argument", () => {
    expect(formatComposite("{0}{0}", ["ab"])).toBe("abab");
  });

  it("unescapes doubled braces", () => {
    expect(formatComposite("{{0}}", [])).toBe("{0}");
    expect(formatComposite("{{{0}}}", ["x"])).toBe("{x}");
  });

  it("copies malformed items literally", () => {
    expect(formatComposite("a } b", [])).toBe("a } b");
    expect(formatComposite("{abc}", [])).toBe("{abc}");
    expect(formatComposite("{0", ["x"])).toBe("{0");
    expect(formatComposite("{0}}", ["x"])).toBe("x}");
  });

  it("pads to the alignment width", () => {
    expect(formatComposite("[{0,5}]", ["ab"])).toBe("[   ab]");
    expect(formatComposite("[{0,-5}]", ["ab"])).toBe("[ab   ]");
    expect(formatComposite("[{0,2}]", ["abcd"])).toBe("[abcd]");
  });

  it("applies format strings", () => {
    expect(formatComposite("{0:D3}", [5])).toBe("005");
    expect(formatComposite("{0:X}", [255])).toBe("FF");
    expect(formatComposite("{0,6:F1}", [2.25])).toBe("   2.3");
  });

  it("ignores an empty format string", () => {
    expect(formatComposite("{0:}", [5])).toBe("5");
  });

  it("renders null arguments as empty text", () => {
    expect(formatComposite("[{0}]", [null])).toBe("[]");
  });

  it("throws for an index with no argument", () => {
    expect(() => formatComposite("{1}", ["a"])).toThrow(FormatError);
    try {
      formatComposite("{1}", ["a"]);
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      if (error instanceof FormatError) {
        expect(error.code).toBe("FORMAT_ERROR");
        expect(error.context).toEqual({ index: 1, count: 1, format: "{1}" });
      }
    }
  });

  it("rejects alignments of a million or more", () => {
    expect(formatComposite("{0,999999}", ["x"])).toHaveLength(999999);
    expect(() => formatComposite("{0,-1000000}", ["x"])).toThrow(FormatError);
    try {
      formatComposite("{0,999999999999}", ["x"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      if (error instanceof FormatError) {
        expect(error.context).toEqual({ index: 0, alignment: 999999999999, format: "{0,999999999999}" });
      }
    }
  });
});
