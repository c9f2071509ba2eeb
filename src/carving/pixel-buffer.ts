/**
 * Float RGB pixel storage used by the carving pipeline.
 * Samples are in [0, 1], row-major, three interleaved channels per pixel.
 */

import { InvalidBufferError } from './errors.js';

export const CHANNELS = 3;

export interface PixelBuffer {
  width: number;
  height: number;
  data: Float32Array;
}

export type Rgb = [number, number, number];

/**
 * Create a buffer, zero-filled unless data is supplied.
 * @param width - Width in pixels (>= 1)
 * @param height - Height in pixels (>= 1)
 * @param data - Optional samples, length must be width * height * 3
 */
export function createPixelBuffer(width: number, height: number, data?: Float32Array): PixelBuffer {
  const buffer = { width, height, data: data ?? new Float32Array(width * height * CHANNELS) };
  assertValidBuffer(buffer);
  assertFiniteSamples(buffer);
  return buffer;
}

/**
 * Build a buffer from nested rows of RGB triples.
 */
export function pixelBufferFromRows(rows: Rgb[][]): PixelBuffer {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const data = new Float32Array(width * height * CHANNELS);

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidBufferError(`Row ${y} has ${row.length} pixels, expected ${width}`);
    }
    row.forEach((pixel, x) => {
      data.set(pixel, (y * width + x) * CHANNELS);
    });
  });

  return createPixelBuffer(width, height, data);
}

export function assertValidBuffer(buffer: PixelBuffer): void {
  const { width, height, data } = buffer;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidBufferError(`Buffer dimensions must be positive integers, got ${width}x${height}`);
  }
  if (data.length !== width * height * CHANNELS) {
    throw new InvalidBufferError(
      `Buffer data length ${data.length} does not match ${width}x${height}x${CHANNELS}`,
    );
  }
}

/**
 * Reject NaN and infinite samples. Out-of-range finite values are allowed and clamped on encode.
 */
export function assertFiniteSamples(buffer: PixelBuffer): void {
  const { width, data } = buffer;
  for (let i = 0; i < data.length; i++) {
    if (!Number.isFinite(data[i])) {
      const pixel = Math.floor(i / CHANNELS);
      throw new InvalidBufferError(
        `Sample ${data[i]} at (${pixel % width}, ${Math.floor(pixel / width)}) is not a finite number`,
      );
    }
  }
}

export function getPixel(buffer: PixelBuffer, x: number, y: number): Rgb {
  const i = (y * buffer.width + x) * CHANNELS;
  return [buffer.data[i], buffer.data[i + 1], buffer.data[i + 2]];
}

/**
 * Swap rows and columns. Returns a new buffer of size height x width.
 */
export function transpose(buffer: PixelBuffer): PixelBuffer {
  const { width, height, data } = buffer;
  const out = new Float32Array(data.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const src = (y * width + x) * CHANNELS;
      const dst = (x * height + y) * CHANNELS;
      out[dst] = data[src];
      out[dst + 1] = data[src + 1];
      out[dst + 2] = data[src + 2];
    }
  }

  return { width: height, height: width, data: out };
}

export function pixelBuffersEqual(a: PixelBuffer, b: PixelBuffer): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}
