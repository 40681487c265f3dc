/**
 * Element constructors.
 *
 * Thin builders for correctly shaped elements; nothing is validated.
 */

import type {
  Alignment,
  Attr,
  Block,
  BlockQuote,
  BulletList,
  Caption,
  Cite,
  Citation,
  Code,
  CodeBlock,
  ColSpec,
  DefinitionList,
  Div,
  Document,
  Emph,
  Figure,
  Format,
  Header,
  HorizontalRule,
  Image,
  Inline,
  LineBlock,
  LineBreak,
  Link,
  ListAttributes,
  Math,
  MathType,
  Meta,
  MetaBlocks,
  MetaBool,
  MetaInlines,
  MetaList,
  MetaMap,
  MetaString,
  MetaValue,
  Note,
  OrderedList,
  Para,
  Plain,
  QuoteType,
  Quoted,
  RawBlock,
  RawInline,
  SmallCaps,
  SoftBreak,
  Space,
  Span,
  Str,
  Strikeout,
  Strong,
  Subscript,
  Superscript,
  Table,
  TableBody,
  TableFoot,
  TableHead,
  Underline,
} from "./types.js";
import { PANDOC_API_VERSION } from "./json.js";

export function attr(
  id: string = "",
  classes: string[] = [],
  attributes: [string, string][] = [],
): Attr {
  return [id, classes, attributes];
}

export function document(blocks: Block[], meta: Meta = {}): Document {
  return { "pandoc-api-version": [...PANDOC_API_VERSION], meta, blocks };
}

// ---------- Inline ----------

export const str = (text: string): Str => ({ t: "Str", c: text });
export const emph = (content: Inline[]): Emph => ({ t: "Emph", c: content });
export const underline = (content: Inline[]): Underline => ({ t: "Underline", c: content });
export const strong = (content: Inline[]): Strong => ({ t: "Strong", c: content });
export const strikeout = (content: Inline[]): Strikeout => ({ t: "Strikeout", c: content });
export const superscript = (content: Inline[]): Superscript => ({ t: "Superscript", c: content });
export const subscript = (content: Inline[]): Subscript => ({ t: "Subscript", c: content });
export const smallCaps = (content: Inline[]): SmallCaps => ({ t: "SmallCaps", c: content });
export const space = (): Space => ({ t: "Space" });
export const softBreak = (): SoftBreak => ({ t: "SoftBreak" });
export const lineBreak = (): LineBreak => ({ t: "LineBreak" });
export const note = (content: Block[]): Note => ({ t: "Note", c: content });

export function quoted(kind: QuoteType["t"], content: Inline[]): Quoted {
  return { t: "Quoted", c: [{ t: kind }, content] };
}

export function cite(citations: Citation[], content: Inline[]): Cite {
  return { t: "Cite", c: [citations, content] };
}

export function code(text: string, attributes: Attr = attr()): Code {
  return { t: "Code", c: [attributes, text] };
}

export function math(kind: MathType["t"], text: string): Math {
  return { t: "Math", c: [{ t: kind }, text] };
}

export function rawInline(format: Format, text: string): RawInline {
  return { t: "RawInline", c: [format, text] };
}

export function link(content: Inline[], url: string, title: string = "", attributes: Attr = attr()): Link {
  return { t: "Link", c: [attributes, content, [url, title]] };
}

export function image(alt: Inline[], url: string, title: string = "", attributes: Attr = attr()): Image {
  return { t: "Image", c: [attributes, alt, [url, title]] };
}

export function span(content: Inline[], attributes: Attr = attr()): Span {
  return { t: "Span", c: [attributes, content] };
}

// ---------- Block ----------

export const plain = (content: Inline[]): Plain => ({ t: "Plain", c: content });
export const para = (content: Inline[]): Para => ({ t: "Para", c: content });
export const lineBlock = (lines: Inline[][]): LineBlock => ({ t: "LineBlock", c: lines });
export const blockQuote = (content: Block[]): BlockQuote => ({ t: "BlockQuote", c: content });
export const bulletList = (items: Block[][]): BulletList => ({ t: "BulletList", c: items });
export const horizontalRule = (): HorizontalRule => ({ t: "HorizontalRule" });

export function codeBlock(text: string, attributes: Attr = attr()): CodeBlock {
  return { t: "CodeBlock", c: [attributes, text] };
}

export function rawBlock(format: Format, text: string): RawBlock {
  return { t: "RawBlock", c: [format, text] };
}

export function orderedList(
  items: Block[][],
  listAttributes: ListAttributes = [1, { t: "DefaultStyle" }, { t: "DefaultDelim" }],
): OrderedList {
  return { t: "OrderedList", c: [listAttributes, items] };
}

export function definitionList(items: [Inline[], Block[][]][]): DefinitionList {
  return { t: "DefinitionList", c: items };
}

export function header(level: number, content: Inline[], attributes: Attr = attr()): Header {
  return { t: "Header", c: [level, attributes, content] };
}

export function caption(content: Block[] = [], short: Inline[] | null = null): Caption {
  return [short, content];
}

export function colSpec(alignment: Alignment["t"] = "AlignDefault"): ColSpec {
  return [{ t: alignment }, { t: "ColWidthDefault" }];
}

export function table(
  tableCaption: Caption,
  colSpecs: ColSpec[],
  head: TableHead,
  bodies: TableBody[],
  foot: TableFoot,
  attributes: Attr = attr(),
): Table {
  return { t: "Table", c: [attributes, tableCaption, colSpecs, head, bodies, foot] };
}

export function figure(content: Block[], figureCaption: Caption = caption(), attributes: Attr = attr()): Figure {
  return { t: "Figure", c: [attributes, figureCaption, content] };
}

export function div(content: Block[], attributes: Attr = attr()): Div {
  return { t: "Div", c: [attributes, content] };
}

// ---------- Meta ----------

export const metaMap = (entries: Meta): MetaMap => ({ t: "MetaMap", c: entries });
export const metaList = (items: MetaValue[]): MetaList => ({ t: "MetaList", c: items });
export const metaBool = (value: boolean): MetaBool => ({ t: "MetaBool", c: value });
export const metaString = (value: string): MetaString => ({ t: "MetaString", c: value });
export const metaInlines = (content: Inline[]): MetaInlines => ({ t: "MetaInlines", c: content });
export const metaBlocks = (content: Block[]): MetaBlocks => ({ t: "MetaBlocks", c: content });
