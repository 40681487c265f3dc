/**
 * Stream entry points for running a filter the way pandoc's `--filter`
 * option does: one JSON document in, one JSON line out.
 */

import type { Readable, Writable } from "node:stream";
import { text } from "node:stream/consumers";
import type { Action, Document, Meta } from "@panwalk/ast";
import { parseDocument, toJson } from "@panwalk/ast";
import { Filter } from "./filter.js";
import type { NamedActions } from "./filter.js";
import type { FilterEventListener } from "./events.js";

/** A ready filter, a list of actions that see every element, or named actions. */
export type FilterSource = Filter | ReadonlyArray<Action> | NamedActions;

export interface StdioOptions {
  /** Stream holding one JSON document. Default: process.stdin. */
  input?: Readable;
  /** Stream the result is written to. Default: process.stdout. */
  output?: Writable;
  /** Target format passed to every action. Default: "". */
  format?: string;
  /** Overrides the document's own metadata. */
  metadata?: Meta;
  /** Receives the filter's events for this run. */
  onEvent?: FilterEventListener;
}

// An empty list is taken as raw actions; both readings give an empty filter.
function isActionList(source: ReadonlyArray<Action> | NamedActions): source is ReadonlyArray<Action> {
  if (!Array.isArray(source)) return false;
  const entries: readonly unknown[] = source;
  return entries.every((entry) => typeof entry === "function");
}

/**
 * Read a document from the input stream and apply the filter built from
 * `source` to it. Throws `MalformedInputError` when the input is not a
 * Pandoc document.
 */
export async function pandocWalk(
  source: FilterSource,
  options: StdioOptions = {},
): Promise<Document> {
  const input = options.input ?? process.stdin;
  const { onEvent } = options;
  const document = parseDocument(await text(input));

  if (!(source instanceof Filter)) {
    const filter = isActionList(source)
      ? Filter.fromActions(source, { onEvent })
      : Filter.fromNamedActions(source, { onEvent });
    return filter.apply(document, options.format ?? "", options.metadata);
  }

  if (!onEvent) return source.apply(document, options.format ?? "", options.metadata);
  source.on(onEvent);
  try {
    return source.apply(document, options.format ?? "", options.metadata);
  } finally {
    source.off(onEvent);
  }
}

/**
 * `pandocWalk`, then write the result to the output stream as a single
 * line of JSON terminated by a newline.
 */
export async function pandocFilter(
  source: FilterSource,
  options: StdioOptions = {},
): Promise<Document> {
  const document = await pandocWalk(source, options);
  const output: Writable = options.output ?? process.stdout;
  await new Promise<void>((resolve, reject) => {
    output.write(`${toJson(document)}\n`, "utf8", (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
  return document;
}
