/**
 * Error types raised by the seam-carving core.
 */

export class CarvingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Requested width/height is not positive, not an integer, or larger than the image. */
export class InvalidTargetError extends CarvingError {}

/** A seam does not fit the buffer it is applied to. Indicates a wiring bug, not bad input. */
export class DimensionMismatchError extends CarvingError {}

/** Zero-sized or malformed buffer or energy map. */
export class InvalidBufferError extends CarvingError {}
