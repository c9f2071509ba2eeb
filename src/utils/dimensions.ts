/**
 * Target-size resolution for the resize tool.
 * Turns the user's width/height request into concrete carving targets.
 */

import { InvalidTargetError } from '../carving/errors.js';

export interface Dimensions {
  width: number;
  height: number;
}

export interface TargetRequest {
  width?: number;
  height?: number;
  /** Derive the missing side from the original aspect ratio, or fit inside both sides. */
  keepAspect?: boolean;
}

/**
 * Resolve requested targets against the original size.
 * @param original - Size of the decoded image
 * @param request - Requested width and/or height
 * @returns Target width and height (not yet checked against the original; carve does that)
 */
export function resolveTargetDimensions(original: Dimensions, request: TargetRequest): Dimensions {
  const { width, height, keepAspect = false } = request;

  if (width === undefined && height === undefined) {
    throw new InvalidTargetError('Provide width and/or height');
  }

  if (!keepAspect) {
    return {
      width: width ?? original.width,
      height: height ?? original.height,
    };
  }

  if (width !== undefined && height !== undefined) {
    // The tighter side is kept exactly as requested; only the other side is scaled
    if (width / original.width <= height / original.height) {
      return { width, height: scaleSide(original.height, width, original.width) };
    }
    return { width: scaleSide(original.width, height, original.height), height };
  }
  if (width !== undefined) {
    return { width, height: scaleSide(original.height, width, original.width) };
  }
  const requestedHeight = height ?? original.height;
  return { width: scaleSide(original.width, requestedHeight, original.height), height: requestedHeight };
}

/** floor(side * requested / reference), multiplying first so integer inputs stay exact. */
function scaleSide(side: number, requested: number, reference: number): number {
  return Math.max(1, Math.floor((side * requested) / reference));
}
