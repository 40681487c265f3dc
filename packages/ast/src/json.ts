/**
 * Pandoc JSON codec.
 *
 * Accepts the current document shape
 *   { "pandoc-api-version": [...], meta: {...}, blocks: [...] }
 * and the legacy shape written by pandoc before 1.18
 *   [ { unMeta: {...} }, [...] ]
 * and always writes the current shape back out.
 */

import type { Block, Document } from "./types.js";
import { isBlock, isMeta, isRecord, isUnknownArray } from "./types.js";
import { MalformedInputError } from "./errors.js";

export const PANDOC_API_VERSION: readonly number[] = [1, 23, 1];

/**
 * Decode one JSON-encoded Pandoc document.
 *
 * Only the top level is checked: the metadata values and the top-level
 * blocks must be elements of the right category.
 */
export function parseDocument(text: string): Document {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new MalformedInputError("Input is not valid JSON", { cause: err });
  }

  const document = toDocument(value);
  if (!document) {
    throw new MalformedInputError("Input is not a Pandoc document");
  }
  return document;
}

/** Serialize a tree as a single line of JSON. */
export function toJson(tree: unknown): string {
  return JSON.stringify(tree);
}

function toDocument(value: unknown): Document | undefined {
  if (isRecord(value)) {
    const meta = value.meta ?? {};
    const blocks = toBlocks(value.blocks);
    if (!isMeta(meta) || !blocks) return undefined;
    return {
      "pandoc-api-version": toApiVersion(value["pandoc-api-version"]),
      meta,
      blocks,
    };
  }

  if (isUnknownArray(value) && value.length === 2) {
    const [head, body] = value;
    if (!isRecord(head)) return undefined;
    const meta = head.unMeta;
    const blocks = toBlocks(body);
    if (!isMeta(meta) || !blocks) return undefined;
    return { "pandoc-api-version": [...PANDOC_API_VERSION], meta, blocks };
  }

  return undefined;
}

function toBlocks(value: unknown): Block[] | undefined {
  if (!isUnknownArray(value)) return undefined;
  const blocks: Block[] = [];
  for (const item of value) {
    if (!isBlock(item)) return undefined;
    blocks.push(item);
  }
  return blocks;
}

function toApiVersion(value: unknown): number[] {
  if (isUnknownArray(value) && value.length > 0) {
    const version: number[] = [];
    for (const part of value) {
      if (typeof part !== "number") return [...PANDOC_API_VERSION];
      version.push(part);
    }
    return version;
  }
  return [...PANDOC_API_VERSION];
}

