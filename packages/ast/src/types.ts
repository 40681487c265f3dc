/**
 * Pandoc JSON AST types.
 *
 * Models the pandoc-types 1.23 JSON encoding: every element is an object
 * tagged by its kind name in `t`, with its contents (if any) in `c`.
 */

// ---------- Element kinds ----------

export const INLINE_KINDS = [
  "Str",
  "Emph",
  "Underline",
  "Strong",
  "Strikeout",
  "Superscript",
  "Subscript",
  "SmallCaps",
  "Quoted",
  "Cite",
  "Code",
  "Space",
  "SoftBreak",
  "LineBreak",
  "Math",
  "RawInline",
  "Link",
  "Image",
  "Note",
  "Span",
] as const satisfies readonly Inline["t"][];

export const BLOCK_KINDS = [
  "Plain",
  "Para",
  "LineBlock",
  "CodeBlock",
  "RawBlock",
  "BlockQuote",
  "OrderedList",
  "BulletList",
  "DefinitionList",
  "Header",
  "HorizontalRule",
  "Table",
  "Figure",
  "Div",
] as const satisfies readonly Block["t"][];

export const META_KINDS = [
  "MetaMap",
  "MetaList",
  "MetaBool",
  "MetaString",
  "MetaInlines",
  "MetaBlocks",
] as const satisfies readonly MetaValue["t"][];

export type InlineKind = (typeof INLINE_KINDS)[number];
export type BlockKind = (typeof BLOCK_KINDS)[number];
export type MetaKind = (typeof META_KINDS)[number];
export type ElementKind = InlineKind | BlockKind | MetaKind;

// ---------- Auxiliary values ----------
// These carry a `t` tag too, but they are not elements.

/** [identifier, classes, key-value pairs] */
export type Attr = [string, string[], [string, string][]];

/** [url, title] */
export type Target = [string, string];

/** Output format name of raw content, e.g. "html" or "latex". */
export type Format = string;

export interface QuoteType { t: "SingleQuote" | "DoubleQuote" }
export interface MathType { t: "DisplayMath" | "InlineMath" }

export interface CitationMode { t: "AuthorInText" | "SuppressAuthor" | "NormalCitation" }

export interface Citation {
  citationId: string;
  citationPrefix: Inline[];
  citationSuffix: Inline[];
  citationMode: CitationMode;
  citationNoteNum: number;
  citationHash: number;
}

export interface ListNumberStyle {
  t: "DefaultStyle" | "Example" | "Decimal" | "LowerRoman" | "UpperRoman" | "LowerAlpha" | "UpperAlpha";
}
export interface ListNumberDelim { t: "DefaultDelim" | "Period" | "OneParen" | "TwoParens" }

/** [start number, style, delimiter] */
export type ListAttributes = [number, ListNumberStyle, ListNumberDelim];

export interface Alignment { t: "AlignLeft" | "AlignRight" | "AlignCenter" | "AlignDefault" }
export type ColWidth = { t: "ColWidth"; c: number } | { t: "ColWidthDefault" };
export type ColSpec = [Alignment, ColWidth];

/** [short caption, caption blocks] */
export type Caption = [Inline[] | null, Block[]];

/** [attr, alignment, row span, column span, contents] */
export type Cell = [Attr, Alignment, number, number, Block[]];
export type Row = [Attr, Cell[]];
export type TableHead = [Attr, Row[]];
/** [attr, row head columns, intermediate head rows, body rows] */
export type TableBody = [Attr, number, Row[], Row[]];
export type TableFoot = [Attr, Row[]];

// ---------- Inline elements ----------

export interface Str { t: "Str"; c: string }
export interface Emph { t: "Emph"; c: Inline[] }
export interface Underline { t: "Underline"; c: Inline[] }
export interface Strong { t: "Strong"; c: Inline[] }
export interface Strikeout { t: "Strikeout"; c: Inline[] }
export interface Superscript { t: "Superscript"; c: Inline[] }
export interface Subscript { t: "Subscript"; c: Inline[] }
export interface SmallCaps { t: "SmallCaps"; c: Inline[] }
export interface Quoted { t: "Quoted"; c: [QuoteType, Inline[]] }
export interface Cite { t: "Cite"; c: [Citation[], Inline[]] }
export interface Code { t: "Code"; c: [Attr, string] }
export interface Space { t: "Space" }
export interface SoftBreak { t: "SoftBreak" }
export interface LineBreak { t: "LineBreak" }
export interface Math { t: "Math"; c: [MathType, string] }
export interface RawInline { t: "RawInline"; c: [Format, string] }
export interface Link { t: "Link"; c: [Attr, Inline[], Target] }
export interface Image { t: "Image"; c: [Attr, Inline[], Target] }
export interface Note { t: "Note"; c: Block[] }
export interface Span { t: "Span"; c: [Attr, Inline[]] }

export type Inline =
  | Str
  | Emph
  | Underline
  | Strong
  | Strikeout
  | Superscript
  | Subscript
  | SmallCaps
  | Quoted
  | Cite
  | Code
  | Space
  | SoftBreak
  | LineBreak
  | Math
  | RawInline
  | Link
  | Image
  | Note
  | Span;

// ---------- Block elements ----------

export interface Plain { t: "Plain"; c: Inline[] }
export interface Para { t: "Para"; c: Inline[] }
export interface LineBlock { t: "LineBlock"; c: Inline[][] }
export interface CodeBlock { t: "CodeBlock"; c: [Attr, string] }
export interface RawBlock { t: "RawBlock"; c: [Format, string] }
export interface BlockQuote { t: "BlockQuote"; c: Block[] }
export interface OrderedList { t: "OrderedList"; c: [ListAttributes, Block[][]] }
export interface BulletList { t: "BulletList"; c: Block[][] }
export interface DefinitionList { t: "DefinitionList"; c: [Inline[], Block[][]][] }
/** [level, attr, title] */
export interface Header { t: "Header"; c: [number, Attr, Inline[]] }
export interface HorizontalRule { t: "HorizontalRule" }
export interface Table {
  t: "Table";
  c: [Attr, Caption, ColSpec[], TableHead, TableBody[], TableFoot];
}
export interface Figure { t: "Figure"; c: [Attr, Caption, Block[]] }
export interface Div { t: "Div"; c: [Attr, Block[]] }

export type Block =
  | Plain
  | Para
  | LineBlock
  | CodeBlock
  | RawBlock
  | BlockQuote
  | OrderedList
  | BulletList
  | DefinitionList
  | Header
  | HorizontalRule
  | Table
  | Figure
  | Div;

// ---------- Metadata ----------

export interface MetaMap { t: "MetaMap"; c: Meta }
export interface MetaList { t: "MetaList"; c: MetaValue[] }
export interface MetaBool { t: "MetaBool"; c: boolean }
export interface MetaString { t: "MetaString"; c: string }
export interface MetaInlines { t: "MetaInlines"; c: Inline[] }
export interface MetaBlocks { t: "MetaBlocks"; c: Block[] }

export type MetaValue = MetaMap | MetaList | MetaBool | MetaString | MetaInlines | MetaBlocks;

/** Document metadata: front matter keys mapped to values. */
export type Meta = Record<string, MetaValue>;

// ---------- Elements and documents ----------

export type Element = Inline | Block | MetaValue;

/** Narrow the element union to the given kind(s). */
export type ElementOf<K> = Extract<Element, { t: K }>;

export interface Document {
  "pandoc-api-version": number[];
  meta: Meta;
  blocks: Block[];
}

// ---------- Guards ----------

const ELEMENT_KINDS: ReadonlySet<string> = new Set<string>([
  ...INLINE_KINDS,
  ...BLOCK_KINDS,
  ...META_KINDS,
]);
const BLOCK_KIND_SET: ReadonlySet<string> = new Set<string>(BLOCK_KINDS);
const META_KIND_SET: ReadonlySet<string> = new Set<string>(META_KINDS);

export function isElementKind(name: string): name is ElementKind {
  return ELEMENT_KINDS.has(name);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isUnknownArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

/**
 * True for objects tagged with an element kind. Auxiliary tagged values
 * such as `{ t: "AlignLeft" }` are not elements.
 */
export function isElement(value: unknown): value is Element {
  if (!isRecord(value)) return false;
  const tag = value.t;
  return typeof tag === "string" && isElementKind(tag);
}

export function isBlock(value: unknown): value is Block {
  return isElement(value) && BLOCK_KIND_SET.has(value.t);
}

export function isMetaValue(value: unknown): value is MetaValue {
  return isElement(value) && META_KIND_SET.has(value.t);
}

export function isMeta(value: unknown): value is Meta {
  return isRecord(value) && Object.values(value).every(isMetaValue);
}
