import { describe, it, expect } from "vitest";
import {
  INLINE_KINDS,
  BLOCK_KINDS,
  META_KINDS,
  isElementKind,
  isElement,
  isBlock,
  isMetaValue,
  isMeta,
} from "../src/types.js";
import {
  attr,
  str,
  para,
  header,
  orderedList,
  table,
  caption,
  colSpec,
  metaString,
  metaBool,
} from "../src/elements.js";

describe("element kinds", () => {
  it("keeps the three categories disjoint", () => {
    const all = [...INLINE_KINDS, ...BLOCK_KINDS, ...META_KINDS];
    expect(new Set(all).size).toBe(all.length);
    expect(all).toHaveLength(40);
  });

  it("recognizes kind names exactly", () => {
    expect(isElementKind("Header")).toBe(true);
    expect(isElementKind("header")).toBe(false);
    expect(isElementKind("AlignLeft")).toBe(false);
    expect(isElementKind("")).toBe(false);
  });
});

describe("guards", () => {
  it("tells elements from auxiliary tagged values", () => {
    expect(isElement(str("a"))).toBe(true);
    expect(isElement({ t: "Space" })).toBe(true);
    expect(isElement({ t: "DoubleQuote" })).toBe(false);
    expect(isElement({ t: 3 })).toBe(false);
    expect(isElement(["Str", "a"])).toBe(false);
    expect(isElement(null)).toBe(false);
  });

  it("checks element categories", () => {
    expect(isBlock(para([]))).toBe(true);
    expect(isBlock(str("a"))).toBe(false);
    expect(isMetaValue(metaBool(true))).toBe(true);
    expect(isMetaValue(para([]))).toBe(false);
  });

  it("checks metadata mappings", () => {
    expect(isMeta({})).toBe(true);
    expect(isMeta({ title: metaString("T") })).toBe(true);
    expect(isMeta({ title: "T" })).toBe(false);
    expect(isMeta([])).toBe(false);
  });
});

describe("element constructors", () => {
  it("encode contents the way pandoc does", () => {
    expect(header(3, [str("H")], attr("id", ["c"], [["k", "v"]]))).toEqual({
      t: "Header",
      c: [3, ["id", ["c"], [["k", "v"]]], [{ t: "Str", c: "H" }]],
    });
    expect(orderedList([[para([])]])).toEqual({
      t: "OrderedList",
      c: [[1, { t: "DefaultStyle" }, { t: "DefaultDelim" }], [[{ t: "Para", c: [] }]]],
    });
  });

  it("builds a table with its auxiliary parts", () => {
    const t = table(caption(), [colSpec("AlignRight")], [attr(), []], [], [attr(), []]);
    expect(t.c[2]).toEqual([[{ t: "AlignRight" }, { t: "ColWidthDefault" }]]);
    expect(t.c[1]).toEqual([null, []]);
  });
});
