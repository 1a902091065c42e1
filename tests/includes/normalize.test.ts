import { normalizeCommentLine, normalizeLines } from "../../src/includes/normalize";

describe("normalizeCommentLine", () => {
  it("strips trailing spaces after a doc comment prefix", () => {
    expect(normalizeCommentLine("//!   ")).toBe("//!");
  });

  it("strips trailing whitespace after a plain comment prefix", () => {
    expect(normalizeCommentLine("//    ")).toBe("//");
    expect(normalizeCommentLine("// \t ")).toBe("//");
  });

  it("leaves comments with content untouched", () => {
    expect(normalizeCommentLine("// content")).toBe("// content");
    expect(normalizeCommentLine("//! Crate docs  ")).toBe("//! Crate docs  ");
  });

  it("leaves bare prefixes and indented comments untouched", () => {
    expect(normalizeCommentLine("//")).toBe("//");
    expect(normalizeCommentLine("//!")).toBe("//!");
    expect(normalizeCommentLine("    //   ")).toBe("    //   ");
  });

  it("does not treat a third slash as part of the prefix", () => {
    expect(normalizeCommentLine("///  ")).toBe("///  ");
  });
});

describe("normalizeLines", () => {
  it("normalizes every line independently", () => {
    expect(normalizeLines(["//! a", "//!  ", "fn main() {}", "// "])).toEqual([
      "//! a",
      "//!",
      "fn main() {}",
      "//",
    ]);
  });
});
