/**
 * Example: a pandoc filter that turns level 2+ headers into emphasized
 * paragraphs.
 *
 * This script demonstrates how to:
 *   1. Build a filter from a kind-scoped action
 *   2. Read the document pandoc writes to stdin
 *   3. Write the rewritten document back to stdout
 *
 * Pass events go to stderr so stdout carries only the JSON document.
 *
 * Usage:
 *   pandoc -t json input.md | npx tsx examples/flatten-headers.ts markdown
 */

import { Filter, named, pandocFilter } from "@panwalk/filter";
import type { FilterEvent } from "@panwalk/filter";
import { emph, para } from "@panwalk/ast";

const flatten = Filter.fromNamedActions(
  [
    named("Header", (header) => {
      const [level, , title] = header.c;
      if (level < 2) return undefined;
      return para([emph(title)]);
    }),
  ],
  {
    onEvent: (event: FilterEvent) => {
      switch (event.type) {
        case "PassCompleted":
          console.error(`[${event.label}] done in ${event.duration}ms`);
          break;
        case "FilterFailed":
          console.error(`Pass ${event.index} failed: ${event.error}`);
          break;
        default:
          break;
      }
    },
  },
);

// pandoc passes the target format as the first argument
await pandocFilter(flatten, { format: process.argv[2] ?? "" });
