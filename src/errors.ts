/**
 * Error taxonomy for hslab
 *
 * Every failure raised by the selection algebra, the type codec and the
 * fan-out layer is one of these classes. None of them is retried here;
 * recovery is left to the caller or the transport.
 */

/**
 * A type descriptor is missing a required key or names an unknown class.
 */
export class MalformedDescriptorError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'MalformedDescriptorError';
  }
}

/**
 * A native element type cannot be expressed as a type descriptor.
 */
export class InvalidTypeError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'InvalidTypeError';
  }
}

/**
 * Illegal index term, unordered or repeated index list, mask of the wrong
 * length or rank, ellipsis misuse, or more terms than the array has axes.
 */
export class InvalidSelectionError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'InvalidSelectionError';
  }
}

/**
 * An integer index or point coordinate falls outside its axis.
 */
export class OutOfRangeError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'OutOfRangeError';
  }
}

export class ShapeMismatchError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'ShapeMismatchError';
  }
}

export class UnsupportedOperationError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * A connection handle outlived the transport it pointed to.
 */
export class StaleHandleError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'StaleHandleError';
  }
}

/**
 * One target of a multi-array operation failed.
 */
export class FanoutError extends Error {
  readonly operation: string;
  readonly index: number;

  constructor(operation: string, index: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`MultiManager.${operation} failed for target ${index}: ${detail}`, { cause });
    this.name = 'FanoutError';
    this.operation = operation;
    this.index = index;
  }
}

export class TransportError extends Error {
  readonly status: number | undefined;

  constructor(msg: string, status?: number) {
    super(msg);
    this.name = 'TransportError';
    this.status = status;
  }
}

/**
 * The server refused a request as too large (HTTP 413).
 */
export class PayloadTooLargeError extends TransportError {
  constructor(msg: string) {
    super(msg, 413);
    this.name = 'PayloadTooLargeError';
  }
}
