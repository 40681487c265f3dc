import { describe, it, expect } from "vitest";
import { parseDocument, toJson, PANDOC_API_VERSION } from "../src/json.js";
import { MalformedInputError, PanwalkError } from "../src/errors.js";
import { str, space, para, header, metaString, document } from "../src/elements.js";

describe("parseDocument", () => {
  it("decodes the current document shape", () => {
    const input = JSON.stringify({
      "pandoc-api-version": [1, 22, 2, 1],
      meta: { title: { t: "MetaString", c: "Notes" } },
      blocks: [{ t: "Para", c: [{ t: "Str", c: "Hi" }] }],
    });

    const doc = parseDocument(input);

    expect(doc["pandoc-api-version"]).toEqual([1, 22, 2, 1]);
    expect(doc.meta).toEqual({ title: metaString("Notes") });
    expect(doc.blocks).toEqual([para([str("Hi")])]);
  });

  it("defaults missing metadata to an empty mapping", () => {
    const doc = parseDocument('{"pandoc-api-version":[1,23,1],"blocks":[]}');
    expect(doc.meta).toEqual({});
    expect(doc.blocks).toEqual([]);
  });

  it("fills in the API version when it is absent", () => {
    const doc = parseDocument('{"meta":{},"blocks":[]}');
    expect(doc["pandoc-api-version"]).toEqual([...PANDOC_API_VERSION]);
  });

  it("upgrades the legacy [{unMeta}, blocks] shape", () => {
    const input = JSON.stringify([
      { unMeta: { lang: { t: "MetaString", c: "en" } } },
      [{ t: "Header", c: [1, ["intro", [], []], [{ t: "Str", c: "Intro" }]] }],
    ]);

    const doc = parseDocument(input);

    expect(doc["pandoc-api-version"]).toEqual([...PANDOC_API_VERSION]);
    expect(doc.meta).toEqual({ lang: metaString("en") });
    expect(doc.blocks).toEqual([header(1, [str("Intro")], ["intro", [], []])]);
  });

  it("rejects text that is not JSON", () => {
    let caught: unknown;
    try {
      parseDocument("{not json");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MalformedInputError);
    expect(caught).toBeInstanceOf(PanwalkError);
    expect(caught instanceof Error && caught.message).toBe("Input is not valid JSON");
    expect(caught instanceof Error && caught.cause).toBeInstanceOf(SyntaxError);
  });

  it("rejects JSON that is not a document", () => {
    expect(() => parseDocument('{"blocks":"nope"}')).toThrow(
      "Input is not a Pandoc document",
    );
    expect(() => parseDocument("42")).toThrow(MalformedInputError);
    expect(() => parseDocument('[{"unMeta":{}}]')).toThrow(MalformedInputError);
  });

  it("rejects inline elements at the top level", () => {
    expect(() => parseDocument('{"meta":{},"blocks":[{"t":"Str","c":"x"}]}')).toThrow(
      MalformedInputError,
    );
  });

  it("rejects metadata values that are not meta elements", () => {
    expect(() =>
      parseDocument('{"meta":{"title":"plain"},"blocks":[]}'),
    ).toThrow(MalformedInputError);
  });
});

describe("toJson", () => {
  it("writes a single line in the current shape", () => {
    const doc = document([para([str("a"), space(), str("b")])], {
      title: metaString("T"),
    });

    expect(toJson(doc)).toBe(
      '{"pandoc-api-version":[1,23,1],"meta":{"title":{"t":"MetaString","c":"T"}},' +
        '"blocks":[{"t":"Para","c":[{"t":"Str","c":"a"},{"t":"Space"},{"t":"Str","c":"b"}]}]}',
    );
  });

  it("decodes what it encodes", () => {
    const doc = document([header(2, [str("Sub")])]);
    expect(parseDocument(toJson(doc))).toEqual(doc);
  });
});
