/* =============================================================================
 * COLLECTOR ERRORS
 * ============================================================================= */

/**
 * Contract violation raised while extracting or merging interface records.
 *
 * Parse failures from the WebIDL parser and I/O failures are not wrapped;
 * they propagate as thrown by their source.
 */
export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly code: CollectorErrorCodeType,
    public readonly node?: string,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "CollectorError";
  }
}

/** Error codes */
export const CollectorErrorCode = {
  MISSING_CHILD: "COLLECTOR_MISSING_CHILD",
  UNKNOWN_MIXIN_TARGET: "COLLECTOR_UNKNOWN_MIXIN_TARGET",
  UNKNOWN_MIXIN_REFERENCE: "COLLECTOR_UNKNOWN_MIXIN_REFERENCE",
} as const;

export type CollectorErrorCodeType = (typeof CollectorErrorCode)[keyof typeof CollectorErrorCode];
