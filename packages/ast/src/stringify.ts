import type { Element } from "./types.js";
import { query } from "./walker.js";

function textOf(element: Element): string | undefined {
  switch (element.t) {
    case "Str":
    case "MetaString":
      return element.c;
    case "Code":
    case "CodeBlock":
    case "Math":
      return element.c[1];
    case "Space":
    case "SoftBreak":
    case "LineBreak":
      return " ";
    default:
      return undefined;
  }
}

/**
 * Concatenate the text content of a tree in document order, leaving out
 * all formatting. Breaks and spaces count as a single space.
 */
export function stringify(tree: unknown): string {
  return query(tree, textOf).join("");
}
