import { PanwalkError } from "@panwalk/ast";

/** A filter was built from actions it cannot use. */
export class ConfigurationError extends PanwalkError {
  /** The offending action or pattern. */
  readonly value: unknown;

  constructor(message: string, options: { value: unknown; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "ConfigurationError";
    this.value = options.value;
  }
}
