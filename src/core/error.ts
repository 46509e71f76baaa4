/**
 * GraphemeErrorCode defines an exported type contract.
 */
export type GraphemeErrorCode = "INPUT_INVALID_UTF8" | "RANGE_TABLE_INVALID" | "BOUNDARY_INVARIANT";

/**
 * Error raised by the segmenter.
 *
 * `BOUNDARY_INVARIANT` marks a defect in the rule table or state machine and is never caused by
 * the input text.
 */
export class GraphemeError extends Error {
  readonly code: GraphemeErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GraphemeErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GraphemeError";
    this.code = code;
    if (details) this.details = details;
  }
}
