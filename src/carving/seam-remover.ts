import { DimensionMismatchError, InvalidBufferError } from './errors.js';
import { CHANNELS, assertValidBuffer, type PixelBuffer } from './pixel-buffer.js';
import type { Seam } from './seam-finder.js';

/**
 * Delete one pixel per row at the seam's column, shifting the rest of the row left.
 * @param buffer - Source buffer, not modified
 * @param seam - Seam with exactly one column per row of the buffer
 * @returns New buffer one column narrower
 */
export function removeVerticalSeam(buffer: PixelBuffer, seam: Seam): PixelBuffer {
  assertValidBuffer(buffer);
  const { width, height, data } = buffer;
  const { columns } = seam;

  if (width < 2) {
    throw new InvalidBufferError('Cannot remove a seam from a buffer one pixel wide');
  }
  if (columns.length !== height) {
    throw new DimensionMismatchError(`Seam has ${columns.length} rows, buffer has ${height}`);
  }

  const newWidth = width - 1;
  const out = new Float32Array(newWidth * height * CHANNELS);
  const rowLength = width * CHANNELS;
  const newRowLength = newWidth * CHANNELS;

  for (let y = 0; y < height; y++) {
    const x = columns[y];
    if (!Number.isInteger(x) || x < 0 || x >= width) {
      throw new DimensionMismatchError(`Seam column ${x} at row ${y} is outside [0, ${width - 1}]`);
    }

    const src = y * rowLength;
    const dst = y * newRowLength;
    const cut = x * CHANNELS;
    out.set(data.subarray(src, src + cut), dst);
    out.set(data.subarray(src + cut + CHANNELS, src + rowLength), dst + cut);
  }

  return { width: newWidth, height, data: out };
}
