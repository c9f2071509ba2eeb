/**
 * Energy functions: per-pixel importance maps computed from a PixelBuffer.
 *
 * Seam search only depends on the EnergyComputer interface, so a new energy
 * function is added by implementing it, not by extending a string switch.
 */

import { InvalidBufferError } from './errors.js';
import { CHANNELS, assertValidBuffer, type PixelBuffer } from './pixel-buffer.js';

export interface EnergyMap {
  width: number;
  height: number;
  data: Float64Array;
}

export interface EnergyComputer {
  readonly name: string;
  compute(buffer: PixelBuffer): EnergyMap;
}

export type EnergyMethod = 'auto' | 'sobel' | 'gradient';

// ITU-R BT.709 luma weights
const LUMA_R = 0.2125;
const LUMA_G = 0.7154;
const LUMA_B = 0.0721;

/**
 * Luminance-weighted grayscale, one value per pixel.
 */
export function toGrayscale(buffer: PixelBuffer): Float64Array {
  assertValidBuffer(buffer);
  const { width, height, data } = buffer;
  const gray = new Float64Array(width * height);
  for (let p = 0, i = 0; p < gray.length; p++, i += CHANNELS) {
    gray[p] = LUMA_R * data[i] + LUMA_G * data[i + 1] + LUMA_B * data[i + 2];
  }
  return gray;
}

/** Half-sample symmetric border: d c b a | a b c d | d c b a */
function reflect(i: number, n: number): number {
  if (i < 0) return Math.min(-i - 1, n - 1);
  if (i >= n) return Math.max(2 * n - i - 1, 0);
  return i;
}

/**
 * Sobel gradient magnitude over the grayscale image.
 * Kernels are [1, 0, -1] along the derivative axis and [1, 2, 1] / 4 across it;
 * the magnitude is sqrt((gx^2 + gy^2) / 2).
 */
export class SobelEnergy implements EnergyComputer {
  readonly name = 'sobel';

  compute(buffer: PixelBuffer): EnergyMap {
    const gray = toGrayscale(buffer);
    const { width, height } = buffer;
    const out = new Float64Array(width * height);
    const at = (x: number, y: number) => gray[reflect(y, height) * width + reflect(x, width)];

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const gx =
          (at(x - 1, y - 1) - at(x + 1, y - 1)) +
          2 * (at(x - 1, y) - at(x + 1, y)) +
          (at(x - 1, y + 1) - at(x + 1, y + 1));
        const gy =
          (at(x - 1, y - 1) - at(x - 1, y + 1)) +
          2 * (at(x, y - 1) - at(x, y + 1)) +
          (at(x + 1, y - 1) - at(x + 1, y + 1));
        out[y * width + x] = Math.sqrt(((gx / 4) ** 2 + (gy / 4) ** 2) / 2);
      }
    }

    return { width, height, data: out };
  }
}

/**
 * Dual-gradient energy: color distance between the left/right and up/down
 * neighbours of each pixel. Neighbours outside the image are skipped.
 */
export class GradientEnergy implements EnergyComputer {
  readonly name = 'gradient';

  compute(buffer: PixelBuffer): EnergyMap {
    assertValidBuffer(buffer);
    const { width, height, data } = buffer;
    const out = new Float64Array(width * height);

    const squaredDistance = (a: number, b: number) => {
      const ia = a * CHANNELS;
      const ib = b * CHANNELS;
      const dr = data[ia] - data[ib];
      const dg = data[ia + 1] - data[ib + 1];
      const db = data[ia + 2] - data[ib + 2];
      return dr * dr + dg * dg + db * db;
    };

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const p = y * width + x;
        let energy = 0;
        if (x > 0) energy += squaredDistance(p - 1, p);
        if (x < width - 1) energy += squaredDistance(p + 1, p);
        if (y > 0) energy += squaredDistance(p - width, p);
        if (y < height - 1) energy += squaredDistance(p + width, p);
        out[p] = Math.sqrt(energy);
      }
    }

    return { width, height, data: out };
  }
}

/**
 * Map a boundary-level method name to its energy function.
 * 'auto' currently resolves to Sobel.
 */
export function resolveEnergyComputer(method: EnergyMethod): EnergyComputer {
  switch (method) {
    case 'auto':
    case 'sobel':
      return new SobelEnergy();
    case 'gradient':
      return new GradientEnergy();
  }
}

/**
 * Build an energy map from nested rows.
 */
export function energyMapFromRows(rows: number[][]): EnergyMap {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  if (width < 1 || height < 1) {
    throw new InvalidBufferError(`Energy map dimensions must be positive, got ${width}x${height}`);
  }

  const data = new Float64Array(width * height);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidBufferError(`Row ${y} has ${row.length} values, expected ${width}`);
    }
    data.set(row, y * width);
  });

  return { width, height, data };
}

export function assertValidEnergyMap(energy: EnergyMap): void {
  const { width, height, data } = energy;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidBufferError(`Energy map dimensions must be positive integers, got ${width}x${height}`);
  }
  if (data.length !== width * height) {
    throw new InvalidBufferError(`Energy map data length ${data.length} does not match ${width}x${height}`);
  }
}
