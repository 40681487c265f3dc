/**
 * An ordered, immutable list of actions applied to a Pandoc tree,
 * one full traversal per action.
 *
 * Each pass walks the tree as left by all earlier passes, so an action may
 * restructure the tree and the next action sees the settled result.
 */

import type { Action, Element, ElementKind, ElementOf, Meta } from "@panwalk/ast";
import { extractMetadata, isElementKind, transform } from "@panwalk/ast";
import { ConfigurationError } from "./errors.js";
import { FilterEventEmitter } from "./events.js";
import type { FilterEventListener } from "./events.js";

// ---------- Kind patterns ----------

/** The kind names in a `|`-separated pattern: `"Emph|Strong"` gives `"Emph" | "Strong"`. */
export type KindsOf<P extends string> = P extends `${infer Head}|${infer Rest}`
  ? Head | KindsOf<Rest>
  : P;

/** `P` when every alternative in it names an element kind, `never` otherwise. */
export type KindPattern<P extends string> = [KindsOf<P>] extends [ElementKind] ? P : never;

/** An action restricted to the element kinds named by its pattern. */
export interface NamedAction {
  readonly pattern: string;
  readonly kinds: ReadonlySet<ElementKind>;
  readonly action: Action;
}

export type NamedActions =
  | ReadonlyArray<NamedAction | readonly [string, Action]>
  | Readonly<Record<string, Action>>;

function parsePattern(pattern: string): ReadonlySet<ElementKind> {
  const kinds = new Set<ElementKind>();
  for (const name of pattern.split("|")) {
    if (!isElementKind(name)) {
      throw new ConfigurationError(
        `Unknown element kind "${name}" in pattern "${pattern}"`,
        { value: pattern },
      );
    }
    kinds.add(name);
  }
  return kinds;
}

function hasKind<K>(
  element: Element,
  kinds: ReadonlySet<string>,
): element is ElementOf<K> {
  return kinds.has(element.t);
}

/**
 * Restrict `action` to the kinds named in `pattern`, e.g. `"Header"` or
 * `"Superscript|Subscript"`. The action's element parameter is narrowed to
 * those kinds.
 */
export function named<P extends string>(
  pattern: P & KindPattern<P>,
  action: Action<ElementOf<KindsOf<P>>>,
): NamedAction {
  const kinds = parsePattern(pattern);
  return {
    pattern,
    kinds,
    action: (element, format, meta) =>
      hasKind<KindsOf<P>>(element, kinds) ? action(element, format, meta) : undefined,
  };
}

function isNamedAction(entry: NamedAction | readonly [string, Action]): entry is NamedAction {
  return !Array.isArray(entry);
}

function toNamedAction(entry: NamedAction | readonly [string, Action]): NamedAction {
  if (isNamedAction(entry)) {
    const candidate: unknown = entry.action;
    if (typeof candidate !== "function") {
      throw new ConfigurationError(
        `Expected a [pattern, action] pair or named() result, got ${describe(entry)}`,
        { value: entry },
      );
    }
    return entry;
  }

  const [pattern, action] = entry;
  const candidate: unknown = action;
  if (typeof candidate !== "function") {
    throw new ConfigurationError(
      `Action for pattern "${pattern}" is not a function: ${describe(candidate)}`,
      { value: candidate },
    );
  }
  const kinds = parsePattern(pattern);
  return {
    pattern,
    kinds,
    action: (element, format, meta) =>
      kinds.has(element.t) ? action(element, format, meta) : undefined,
  };
}

function isEntryList(
  actions: NamedActions,
): actions is ReadonlyArray<NamedAction | readonly [string, Action]> {
  return Array.isArray(actions);
}

function describe(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "function") return "function";
  if (value === null || typeof value !== "object") return String(value);
  return Array.isArray(value) ? "array" : "object";
}

// ---------- Filter ----------

export interface FilterConfig {
  /** Receives an event before and after every pass. */
  onEvent?: FilterEventListener;
}

interface Pass {
  readonly label: string;
  readonly action: Action;
}

export class Filter {
  private readonly passes: readonly Pass[];
  private readonly events = new FilterEventEmitter();

  private constructor(passes: Pass[], config: FilterConfig) {
    this.passes = Object.freeze(passes);
    if (config.onEvent) this.events.on(config.onEvent);
  }

  /**
   * Build a filter from `[pattern, action]` pairs (or `named()` results),
   * or from a record whose insertion order is the pass order. Each action
   * only sees elements whose kind its pattern names.
   */
  static fromNamedActions(actions: NamedActions, config: FilterConfig = {}): Filter {
    const entries: ReadonlyArray<NamedAction | readonly [string, Action]> =
      isEntryList(actions) ? actions : Object.entries(actions);
    const passes = entries.map((entry) => {
      const { pattern, action } = toNamedAction(entry);
      return { label: pattern, action };
    });
    return new Filter(passes, config);
  }

  /** Build a filter whose actions see every element. */
  static fromActions(actions: ReadonlyArray<Action>, config: FilterConfig = {}): Filter {
    const passes = actions.map((action, index) => {
      const candidate: unknown = action;
      if (typeof candidate !== "function") {
        throw new ConfigurationError(
          `Action at index ${index} is not a function: ${describe(candidate)}`,
          { value: candidate },
        );
      }
      return { label: `action[${index}]`, action };
    });
    return new Filter(passes, config);
  }

  /** Register a listener for the events of every later `apply`. */
  on(listener: FilterEventListener): void {
    this.events.on(listener);
  }

  /** Remove a listener registered with `on` or through `onEvent`. */
  off(listener: FilterEventListener): void {
    this.events.off(listener);
  }

  /** Number of passes `apply` runs. */
  get size(): number {
    return this.passes.length;
  }

  /** Pass labels in order: the pattern of a named action, `action[i]` otherwise. */
  get labels(): string[] {
    return this.passes.map((pass) => pass.label);
  }

  /**
   * Run every action over the whole tree, in construction order.
   *
   * `metadata` defaults to the tree's own metadata when it is a full
   * document, and to an empty mapping otherwise. The tree is mutated in
   * place and returned. Errors thrown by actions propagate unchanged.
   */
  apply<T>(tree: T, format: string = "", metadata?: Meta): T {
    const meta = metadata ?? extractMetadata(tree);
    const startTime = Date.now();
    this.events.emitFilterStarted(this.passes.length, format);

    for (const [index, pass] of this.passes.entries()) {
      const passStart = Date.now();
      this.events.emitPassStarted(index, pass.label);
      try {
        transform(tree, pass.action, format, meta);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.events.emitFilterFailed(index, message, Date.now() - startTime);
        throw err;
      }
      this.events.emitPassCompleted(index, pass.label, Date.now() - passStart);
    }

    this.events.emitFilterCompleted(Date.now() - startTime);
    return tree;
  }
}
