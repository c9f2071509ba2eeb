import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { createPixelBuffer, type PixelBuffer } from '../../src/carving/index.js';
import { fixturesDir } from './paths.js';

/**
 * Deterministic test pattern: diagonal ramps per channel plus a bright vertical bar.
 */
export function patternBuffer(width: number, height: number): PixelBuffer {
  const buffer = createPixelBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 3;
      const bar = x === Math.floor(width / 2);
      buffer.data[i] = bar ? 1 : ((x * 37 + y * 11) % 256) / 255;
      buffer.data[i + 1] = bar ? 1 : ((x * 5 + y * 53) % 256) / 255;
      buffer.data[i + 2] = bar ? 1 : ((x * 19 + y * 29) % 256) / 255;
    }
  }
  return buffer;
}

/**
 * Write the test pattern as a PNG and return its absolute path.
 */
export async function ensureFixtureImage(name: string, width: number, height: number): Promise<string> {
  const filePath = path.resolve(fixturesDir, `${name}.png`);
  await fs.mkdir(fixturesDir, { recursive: true });

  const { data } = patternBuffer(width, height);
  const bytes = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    bytes[i] = Math.round(data[i] * 255);
  }

  const buffer = await sharp(bytes, { raw: { width, height, channels: 3 } })
    .png()
    .toBuffer();

  await fs.writeFile(filePath, buffer);

  return filePath;
}
