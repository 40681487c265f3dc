export const VERSION = "0.1.0";

// Types
export {
  INLINE_KINDS,
  BLOCK_KINDS,
  META_KINDS,
  isElementKind,
  isElement,
  isBlock,
  isMetaValue,
  isMeta,
  isRecord,
  isUnknownArray,
} from "./types.js";
export type {
  InlineKind,
  BlockKind,
  MetaKind,
  ElementKind,
  Attr,
  Target,
  Format,
  QuoteType,
  MathType,
  CitationMode,
  Citation,
  ListNumberStyle,
  ListNumberDelim,
  ListAttributes,
  Alignment,
  ColWidth,
  ColSpec,
  Caption,
  Cell,
  Row,
  TableHead,
  TableBody,
  TableFoot,
  Str,
  Emph,
  Underline,
  Strong,
  Strikeout,
  Superscript,
  Subscript,
  SmallCaps,
  Quoted,
  Cite,
  Code,
  Space,
  SoftBreak,
  LineBreak,
  Math,
  RawInline,
  Link,
  Image,
  Note,
  Span,
  Inline,
  Plain,
  Para,
  LineBlock,
  CodeBlock,
  RawBlock,
  BlockQuote,
  OrderedList,
  BulletList,
  DefinitionList,
  Header,
  HorizontalRule,
  Table,
  Figure,
  Div,
  Block,
  MetaMap,
  MetaList,
  MetaBool,
  MetaString,
  MetaInlines,
  MetaBlocks,
  MetaValue,
  Meta,
  Element,
  ElementOf,
  Document,
} from "./types.js";

// Errors
export { PanwalkError, MalformedInputError } from "./errors.js";

// JSON codec
export { parseDocument, toJson, PANDOC_API_VERSION } from "./json.js";

// Element constructors
export * from "./elements.js";

// Walker
export { transform, walk, query } from "./walker.js";
export type { Action, NodeResult } from "./walker.js";

// Text and metadata
export { stringify } from "./stringify.js";
export { extractMetadata, metaToJs } from "./metadata.js";
export type { MetaJs } from "./metadata.js";
