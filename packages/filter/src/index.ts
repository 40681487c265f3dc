export const VERSION = "0.1.0";

// Filter
export { Filter, named } from "./filter.js";
export type {
  FilterConfig,
  KindPattern,
  KindsOf,
  NamedAction,
  NamedActions,
} from "./filter.js";

// Errors
export { ConfigurationError } from "./errors.js";

// Events
export { FilterEventEmitter } from "./events.js";
export type {
  FilterEvent,
  FilterEventListener,
  FilterStartedEvent,
  PassStartedEvent,
  PassCompletedEvent,
  FilterCompletedEvent,
  FilterFailedEvent,
} from "./events.js";

// Stream entry points
export { pandocWalk, pandocFilter } from "./stdio.js";
export type { FilterSource, StdioOptions } from "./stdio.js";

// Re-exported for filter scripts
export { stringify } from "@panwalk/ast";
