import { describe, it, expect } from "vitest";
import { stringify } from "../src/stringify.js";
import {
  str,
  space,
  softBreak,
  lineBreak,
  emph,
  strong,
  span,
  link,
  code,
  math,
  rawInline,
  para,
  header,
  codeBlock,
  metaString,
  document,
} from "../src/elements.js";

describe("stringify", () => {
  it("concatenates leaf text through nested formatting", () => {
    const tree = emph([str("a"), strong([span([str("b")])]), link([str("c")], "https://example.org")]);
    expect(stringify(tree)).toBe("abc");
  });

  it("turns spaces and breaks into single spaces", () => {
    const tree = para([str("one"), space(), str("two"), softBreak(), str("three"), lineBreak(), str("four")]);
    expect(stringify(tree)).toBe("one two three four");
  });

  it("includes inline code and math text", () => {
    const tree = para([str("x"), space(), code("f()"), space(), math("InlineMath", "y^2")]);
    expect(stringify(tree)).toBe("x f() y^2");
  });

  it("leaves out raw content", () => {
    const tree = para([rawInline("html", "<br>"), str("kept")]);
    expect(stringify(tree)).toBe("kept");
  });

  it("includes code block text", () => {
    const tree = [para([str("a")]), codeBlock("b")];
    expect(stringify(tree)).toBe("ab");
  });

  it("reads a single leaf element", () => {
    expect(stringify(str("solo"))).toBe("solo");
    expect(stringify(metaString("meta text"))).toBe("meta text");
  });

  it("walks a whole document, metadata first", () => {
    const doc = document([header(1, [str("Head")]), para([str("Body")])], {
      title: metaString("Title "),
    });
    expect(stringify(doc)).toBe("Title HeadBody");
  });

  it("returns an empty string when there is no text", () => {
    expect(stringify([])).toBe("");
    expect(stringify(para([]))).toBe("");
  });
});
