/**
 * Seam-carving orchestration.
 *
 * Validate -> reduce width -> transpose -> reduce height -> transpose back.
 * Width is always reduced completely before height. Carving is not
 * commutative, so (w, h) and (h, w) orders can give different images.
 */

import { SobelEnergy, type EnergyComputer } from './energy.js';
import { InvalidTargetError } from './errors.js';
import { assertFiniteSamples, assertValidBuffer, transpose, type PixelBuffer } from './pixel-buffer.js';
import { findVerticalSeam } from './seam-finder.js';
import { removeVerticalSeam } from './seam-remover.js';

export type CarvePhase = 'width' | 'height';

export interface CarveProgress {
  phase: CarvePhase;
  /** Seams removed so far, both phases combined. */
  seamsRemoved: number;
  seamsTotal: number;
  /** Current size, in the orientation of the input buffer. */
  width: number;
  height: number;
}

export interface CarveOptions {
  /** Defaults to the current width. */
  targetWidth?: number;
  /** Defaults to the current height. */
  targetHeight?: number;
  /** Defaults to Sobel. */
  energy?: EnergyComputer;
  /** Called after every removed seam. */
  onProgress?: (progress: CarveProgress) => void;
  /** Checked before every seam; an aborted signal throws its reason. */
  signal?: AbortSignal;
}

function validateTarget(dimension: CarvePhase, target: number, current: number): void {
  if (!Number.isInteger(target) || target <= 0) {
    throw new InvalidTargetError(`Target ${dimension} must be a positive integer, got ${target}`);
  }
  if (target > current) {
    throw new InvalidTargetError(
      `Target ${dimension} ${target} exceeds the original ${dimension} ${current}; enlarging is not supported`,
    );
  }
}

/**
 * Remove vertical seams until the buffer is targetWidth wide, yielding after each one.
 * Energy is recomputed from scratch for every seam.
 */
function* reduceWidth(
  buffer: PixelBuffer,
  targetWidth: number,
  energy: EnergyComputer,
  signal: AbortSignal | undefined,
): Generator<PixelBuffer, PixelBuffer, void> {
  let current = buffer;
  while (current.width > targetWidth) {
    signal?.throwIfAborted();
    const seam = findVerticalSeam(energy.compute(current));
    current = removeVerticalSeam(current, seam);
    yield current;
  }
  return current;
}

/**
 * Seam-by-seam form of {@link carve}: yields progress after every removed seam
 * and returns the carved buffer. Targets are validated on the first `next()`,
 * before any seam is removed. `onProgress` is not called; the caller drives the loop.
 */
export function* carveSteps(
  buffer: PixelBuffer,
  options: CarveOptions = {},
): Generator<CarveProgress, PixelBuffer, void> {
  assertValidBuffer(buffer);
  assertFiniteSamples(buffer);
  const { width, height } = buffer;
  const targetWidth = options.targetWidth ?? width;
  const targetHeight = options.targetHeight ?? height;

  validateTarget('width', targetWidth, width);
  validateTarget('height', targetHeight, height);

  const energy = options.energy ?? new SobelEnergy();
  const seamsTotal = (width - targetWidth) + (height - targetHeight);
  let seamsRemoved = 0;
  let current = buffer;

  if (targetWidth < width) {
    const steps = reduceWidth(current, targetWidth, energy, options.signal);
    let step = steps.next();
    while (!step.done) {
      seamsRemoved++;
      yield { phase: 'width', seamsRemoved, seamsTotal, width: step.value.width, height: step.value.height };
      step = steps.next();
    }
    current = step.value;
  }

  if (targetHeight < height) {
    // Rows become columns, so the vertical routine removes horizontal seams
    const steps = reduceWidth(transpose(current), targetHeight, energy, options.signal);
    let step = steps.next();
    while (!step.done) {
      seamsRemoved++;
      yield { phase: 'height', seamsRemoved, seamsTotal, width: step.value.height, height: step.value.width };
      step = steps.next();
    }
    current = transpose(step.value);
  }

  return current;
}

/**
 * Shrink a buffer to the requested size by removing low-energy seams.
 * An unspecified dimension is left unchanged; when nothing needs removing the
 * input buffer is returned as is.
 * @throws InvalidTargetError before any work when a target is invalid or larger than the input
 */
export function carve(buffer: PixelBuffer, options: CarveOptions = {}): PixelBuffer {
  const steps = carveSteps(buffer, options);
  let step = steps.next();
  while (!step.done) {
    options.onProgress?.(step.value);
    step = steps.next();
  }
  return step.value;
}
