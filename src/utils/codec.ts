/**
 * Image codec for the carving pipeline.
 * Uses Sharp to move between encoded files and float RGB PixelBuffers.
 */

import sharp from 'sharp';
import { CHANNELS, createPixelBuffer, type PixelBuffer } from '../carving/pixel-buffer.js';
import type { EnergyMap } from '../carving/energy.js';

export type OutputFormat = 'png' | 'jpg' | 'webp';

export const MIME_TYPES: Record<OutputFormat, 'image/png' | 'image/jpeg' | 'image/webp'> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  webp: 'image/webp',
};

export interface DecodeOptions {
  /** Passed to Sharp; larger inputs are rejected. */
  limitInputPixels?: number;
}

/**
 * Decode an image file or buffer into float RGB samples in [0, 1].
 * Alpha is dropped without compositing; single-channel images are replicated to RGB.
 * @param input - Path or encoded image bytes
 */
export async function decodeImage(input: string | Buffer, options: DecodeOptions = {}): Promise<PixelBuffer> {
  const { data, info } = await sharp(input, { limitInputPixels: options.limitInputPixels })
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const { width, height, channels } = info;
  const pixels = new Uint8Array(data);
  const samples = new Float32Array(width * height * CHANNELS);

  for (let p = 0; p < width * height; p++) {
    const src = p * channels;
    const dst = p * CHANNELS;
    if (channels >= 3) {
      samples[dst] = pixels[src] / 255;
      samples[dst + 1] = pixels[src + 1] / 255;
      samples[dst + 2] = pixels[src + 2] / 255;
    } else {
      const v = pixels[src] / 255;
      samples[dst] = v;
      samples[dst + 1] = v;
      samples[dst + 2] = v;
    }
  }

  return createPixelBuffer(width, height, samples);
}

function toByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value * 255)));
}

/**
 * Encode a PixelBuffer. Samples are clamped to [0, 1] and rounded to the nearest byte.
 * @returns Encoded image bytes
 */
export async function encodeImage(buffer: PixelBuffer, format: OutputFormat): Promise<Buffer> {
  const { width, height, data } = buffer;
  const bytes = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    bytes[i] = toByte(data[i]);
  }

  const image = sharp(bytes, { raw: { width, height, channels: CHANNELS } });

  if (format === 'png') {
    return image.png().toBuffer();
  } else if (format === 'webp') {
    return image.webp({ quality: 90 }).toBuffer();
  } else {
    return image.jpeg({ quality: 90 }).toBuffer();
  }
}

/**
 * Render an energy map as a grey image, normalised so the strongest edge is white.
 * An all-zero map renders black.
 */
export function energyToPixelBuffer(energy: EnergyMap): PixelBuffer {
  const { width, height, data } = energy;
  let max = 0;
  for (const value of data) {
    if (value > max) max = value;
  }

  const samples = new Float32Array(width * height * CHANNELS);
  for (let p = 0; p < data.length; p++) {
    const v = max > 0 ? data[p] / max : 0;
    samples.fill(v, p * CHANNELS, p * CHANNELS + CHANNELS);
  }

  return createPixelBuffer(width, height, samples);
}
