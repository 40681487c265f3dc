/**
 * Error hierarchy shared by the panwalk packages.
 *
 * Errors thrown by user-supplied actions are never wrapped in these types.
 */

/** Base error for all panwalk errors. */
export class PanwalkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "PanwalkError";
  }
}

/** Input could not be decoded into a Pandoc document. */
export class MalformedInputError extends PanwalkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedInputError";
  }
}
