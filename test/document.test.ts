import { describe, it, expect } from "vitest";
import {
  splitLines,
  joinLines,
  detectEol,
  parseHeading,
  spliceLines,
  insertBlock,
} from "../src/document.js";

describe("splitLines / joinLines", () => {
  it("keeps each line's terminator", () => {
    expect(splitLines("a\nb\r\nc")).toEqual([
      { text: "a", eol: "\n" },
      { text: "b", eol: "\r\n" },
      { text: "c", eol: "" },
    ]);
  });

  it("returns no lines for an empty document", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("does not produce an empty line for a trailing newline", () => {
    expect(splitLines("a\n")).toEqual([{ text: "a", eol: "\n" }]);
  });

  it("round-trips mixed line endings exactly", () => {
    const text = "# T\r\n\r\nbody\n\nend";
    expect(joinLines(splitLines(text))).toBe(text);
  });
});

describe("detectEol", () => {
  it("uses the first terminator found", () => {
    expect(detectEol(splitLines("a\r\nb\n"))).toBe("\r\n");
  });

  it("defaults to \\n", () => {
    expect(detectEol(splitLines("single line"))).toBe("\n");
  });
});

describe("parseHeading", () => {
  it("parses levels 1 through 6", () => {
    expect(parseHeading("# Title")).toEqual({ level: 1, text: "Title" });
    expect(parseHeading("###### Deep  ")).toEqual({ level: 6, text: "Deep" });
  });

  it("requires whitespace after the hashes", () => {
    expect(parseHeading("#hashtag")).toBeUndefined();
  });

  it("rejects seven hashes", () => {
    expect(parseHeading("####### Too deep")).toBeUndefined();
  });

  it("rejects indented hashes", () => {
    expect(parseHeading("  # not a heading")).toBeUndefined();
  });
});

describe("spliceLines", () => {
  it("terminates an unterminated last line before appending", () => {
    const lines = spliceLines(splitLines("a"), 1, 0, ["b"], "\n");
    expect(joinLines(lines)).toBe("a\nb\n");
  });

  it("gives the last replacement line the removed line's terminator", () => {
    const lines = spliceLines(splitLines("a\nold1\nold2"), 1, 2, ["new"], "\n");
    expect(joinLines(lines)).toBe("a\nnew");
  });
});

describe("insertBlock", () => {
  it("pads with blank lines where neighbours are not blank", () => {
    const lines = insertBlock(splitLines("a\nb\n"), 1, ["X"], "\n");
    expect(joinLines(lines)).toBe("a\n\nX\n\nb\n");
  });

  it("reuses existing blank neighbours", () => {
    const lines = insertBlock(splitLines("a\n\nb\n"), 2, ["X"], "\n");
    expect(joinLines(lines)).toBe("a\n\nX\n\nb\n");
  });

  it("adds no separators into an empty document", () => {
    expect(joinLines(insertBlock([], 0, ["X", "Y"], "\n"))).toBe("X\nY\n");
  });
});
