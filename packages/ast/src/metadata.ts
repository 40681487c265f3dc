/**
 * Document metadata helpers.
 */

import type { Meta, MetaValue } from "./types.js";
import { isMeta, isRecord, isUnknownArray } from "./types.js";
import { stringify } from "./stringify.js";

/** Plain JS view of a metadata value. */
export type MetaJs = string | boolean | MetaJs[] | { [key: string]: MetaJs };

/**
 * Return the metadata of a full document, by reference, or a fresh empty
 * mapping when `tree` is anything else. Never throws.
 */
export function extractMetadata(tree: unknown): Meta {
  if (isRecord(tree) && isUnknownArray(tree.blocks)) {
    const meta = tree.meta;
    if (isMeta(meta)) return meta;
  }
  // Legacy shape: [{ unMeta }, blocks]
  if (isUnknownArray(tree) && tree.length === 2) {
    const head = tree[0];
    const unMeta = isRecord(head) ? head.unMeta : undefined;
    if (isMeta(unMeta)) return unMeta;
  }
  return {};
}

/**
 * Convert a metadata value to plain JS. Inline and block content is
 * flattened to its text with `stringify`.
 */
export function metaToJs(value: MetaValue): MetaJs {
  switch (value.t) {
    case "MetaMap":
      return Object.fromEntries(
        Object.entries(value.c).map(([key, entry]) => [key, metaToJs(entry)]),
      );
    case "MetaList":
      return value.c.map(metaToJs);
    case "MetaBool":
    case "MetaString":
      return value.c;
    case "MetaInlines":
    case "MetaBlocks":
      return stringify(value.c);
  }
}
