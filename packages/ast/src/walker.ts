/**
 * Depth-first traversal over a Pandoc JSON tree.
 *
 * `transform` rewrites the tree in place; `query` and `walk` only read it.
 * All three visit elements in document order and keep their own work
 * stack, so deeply nested documents do not exhaust the call stack.
 */

import type { Element, Meta } from "./types.js";
import { isElement, isRecord, isUnknownArray } from "./types.js";

/**
 * What an action returns for the element it was given:
 * - `undefined`: keep the element (the walker descends into it)
 * - `[]`: delete it
 * - an element: replace it
 * - a list of elements: splice them in its place, in order
 */
export type NodeResult = Element | readonly Element[] | null | undefined | void;

export type Action<E extends Element = Element> = (
  element: E,
  format: string,
  meta: Meta,
) => NodeResult;

interface Frame {
  items: unknown[];
  index: number;
  /** Elements in `items` are offered to the action and may be replaced. */
  splice: boolean;
}

function frameFor(value: unknown): Frame | undefined {
  if (isUnknownArray(value)) {
    return { items: value, index: 0, splice: true };
  }
  if (isRecord(value)) {
    return { items: Object.values(value), index: 0, splice: false };
  }
  return undefined;
}

function isReplacement(result: NodeResult): result is Element | readonly Element[] {
  return result !== undefined && result !== null;
}

function isElementList(result: Element | readonly Element[]): result is readonly Element[] {
  return Array.isArray(result);
}

/**
 * Apply `action` to every element that sits in an array anywhere below
 * `tree`, splicing its result into place. Replacement elements are
 * descended into but not offered to the action again. The root itself is
 * never offered, since it has no parent array to splice into.
 *
 * The tree is mutated and returned; errors thrown by `action` propagate.
 */
export function transform<T>(
  tree: T,
  action: Action,
  format: string = "",
  meta: Meta = {},
): T {
  const stack: Frame[] = [];
  const root = frameFor(tree);
  if (root) stack.push(root);

  let frame: Frame | undefined;
  while ((frame = stack.at(-1)) !== undefined) {
    if (frame.index >= frame.items.length) {
      stack.pop();
      continue;
    }

    const item = frame.items[frame.index];
    if (frame.splice && isElement(item)) {
      const result = action(item, format, meta);
      if (isReplacement(result)) {
        const replacements = isElementList(result) ? [...result] : [result];
        frame.items.splice(frame.index, 1, ...replacements);
        frame.index += replacements.length;
        stack.push({ items: replacements, index: 0, splice: false });
        continue;
      }
    }

    frame.index += 1;
    const child = frameFor(item);
    if (child) stack.push(child);
  }

  return tree;
}

/**
 * Call `visitor` on every element in `tree`, in document order, including
 * `tree` itself when it is an element and elements held outside arrays
 * (such as the values of a `MetaMap`).
 */
export function walk(tree: unknown, visitor: (element: Element) => void): void {
  const stack: unknown[] = [tree];
  while (stack.length > 0) {
    const value = stack.pop();
    if (isElement(value)) visitor(value);

    const children = isUnknownArray(value)
      ? value
      : isRecord(value)
        ? Object.values(value)
        : [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/** Collect every result of `fn` that is not `undefined`, in document order. */
export function query<R>(
  tree: unknown,
  fn: (element: Element) => R | undefined,
): R[] {
  const results: R[] = [];
  walk(tree, (element) => {
    const result = fn(element);
    if (result !== undefined) results.push(result);
  });
  return results;
}
