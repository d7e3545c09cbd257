// CHANGE: Name the two failure kinds the conversion core can raise.
// WHY: Callers branch on the error class to skip one file or abort the batch.

/**
 * Raised when an output buffer cannot be allocated.
 *
 * The original `RangeError` is kept as `cause`.
 */
export class AllocationError extends Error {
  readonly requestedBytes: number;

  constructor(requestedBytes: number, options?: { readonly cause?: unknown }) {
    super(`Cannot allocate ${requestedBytes} bytes for converted content`, options);
    this.name = "AllocationError";
    this.requestedBytes = requestedBytes;
  }
}

/**
 * Raised when a conversion target has no terminator sequence (`mixed`, `none`).
 */
export class UnsupportedTargetError extends Error {
  readonly target: string;

  constructor(target: string) {
    super(`Unsupported conversion target: ${target}. Use lf, crlf or cr.`);
    this.name = "UnsupportedTargetError";
    this.target = target;
  }
}

/**
 * Raised by the scanner for files above the configured size ceiling; the file is skipped.
 */
export class FileTooLargeError extends Error {
  constructor(readonly path: string, readonly size: number, readonly limit: number) {
    super(`File too large (${size} bytes, limit ${limit})`);
    this.name = "FileTooLargeError";
  }
}
