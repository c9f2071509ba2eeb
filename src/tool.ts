/**
 * content_aware_resize tool: parameters and handler.
 * Decodes an image, shrinks it by seam carving and writes and/or returns the result.
 */

import { z } from 'zod';
import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';

import { InvalidTargetError, carveSteps, resolveEnergyComputer } from './carving/index.js';
import { decodeImage, encodeImage, energyToPixelBuffer, MIME_TYPES, type OutputFormat } from './utils/codec.js';
import type { Config } from './utils/config.js';
import { resolveTargetDimensions } from './utils/dimensions.js';

// Supported input extensions
const SUPPORTED_INPUT_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'];

// Upper bound on progress notifications per call
const MAX_PROGRESS_REPORTS = 20;

export const ContentAwareResizeParams = z.object({
  inputPath: z.string().describe('Absolute path to the source image (.png, .jpg, .jpeg, .webp)'),
  outputFileName: z.string().describe('Output filename (extension auto-added if missing)'),

  outputType: z.enum(['file', 'base64', 'combine'])
    .default('combine')
    .describe('Output format: file=file only, base64=base64 only, combine=both'),
  outputPath: z.string().optional()
    .describe('Output directory path (MUST be an absolute path when outputType is file or combine)'),
  outputFormat: z.enum(['png', 'jpg', 'webp']).default('png')
    .describe('Output format'),

  width: z.number().int().min(1).optional()
    .describe('Target width in pixels. Must not exceed the source width (shrinking only).'),
  height: z.number().int().min(1).optional()
    .describe('Target height in pixels. Must not exceed the source height (shrinking only).'),
  keepAspect: z.boolean().default(false)
    .describe('Keep the source aspect ratio: derive the missing side, or fit inside both sides'),

  energy: z.enum(['auto', 'sobel', 'gradient']).default('auto')
    .describe('Energy function: auto=sobel, sobel=edge magnitude, gradient=neighbour color difference'),

  debug: z.boolean().default(false)
    .describe('Debug mode: also write the energy map of the source image'),
});

export type ContentAwareResizeArgs = z.infer<typeof ContentAwareResizeParams>;

type LogData = Record<string, string | number | boolean | null>;

/** Subset of the FastMCP tool context used by the handler. */
export interface ToolContext {
  log: {
    debug(message: string, data?: LogData): void;
    info(message: string, data?: LogData): void;
    warn(message: string, data?: LogData): void;
    error(message: string, data?: LogData): void;
  };
  reportProgress(progress: { progress: number; total?: number }): Promise<void>;
}

export type ToolContent =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string };

export interface ToolResult {
  content: ToolContent[];
}

interface ContentAwareResizeOutput {
  success: boolean;
  filePath?: string;
  base64?: string;
  mimeType?: string;
  width: number;
  height: number;
  originalWidth: number;
  originalHeight: number;
  seamsRemoved: number;
  format: string;
  message: string;
  warning?: string;
}

function failure(message: string): ToolResult {
  return {
    content: [
      { type: 'text', text: JSON.stringify({ success: false, message, width: 0, height: 0, format: '' }) },
    ],
  };
}

// Extensions already accepted for each output format
const FORMAT_EXTENSIONS: Record<OutputFormat, string[]> = {
  png: ['.png'],
  jpg: ['.jpg', '.jpeg'],
  webp: ['.webp'],
};

function withExtension(fileName: string, format: OutputFormat): string {
  const ext = path.extname(fileName).toLowerCase();
  return FORMAT_EXTENSIONS[format].includes(ext) ? fileName : `${fileName}.${format}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Write bytes into dir, falling back to the configured fallback directory when dir is not writable.
 * A timestamp is appended in the fallback directory if the name is taken.
 */
async function writeWithFallback(
  dir: string,
  fileName: string,
  bytes: Buffer,
  fallbackDir: string,
  log: ToolContext['log'],
): Promise<{ filePath: string; warning?: string }> {
  const fullPath = path.resolve(dir, fileName);

  try {
    log.info('Attempting to save output file', { path: fullPath });
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, bytes);
    log.info('Saved output file', { path: fullPath });
    return { filePath: fullPath };
  } catch (err) {
    log.warn('Failed to write to requested outputPath, attempting fallback', { error: errorMessage(err) });

    try {
      await fs.mkdir(fallbackDir, { recursive: true });

      let fallbackFullPath = path.resolve(fallbackDir, fileName);
      if (fsSync.existsSync(fallbackFullPath)) {
        const ext = path.extname(fileName);
        const base = path.basename(fileName, ext);
        fallbackFullPath = path.resolve(fallbackDir, `${base}_${Date.now()}${ext}`);
      }

      await fs.writeFile(fallbackFullPath, bytes);
      log.warn('Saved output to fallback', { fallback: fallbackFullPath });
      return {
        filePath: fallbackFullPath,
        warning: `Requested path not writable; saved to fallback: ${fallbackFullPath}`,
      };
    } catch (fallbackErr) {
      log.error('Fallback write failed', { error: errorMessage(fallbackErr) });
      throw new Error(
        `Failed to write output to requested path and fallback. Errors: ${errorMessage(err)}; ${errorMessage(fallbackErr)}`,
      );
    }
  }
}

/**
 * Run content-aware resize for one tool call.
 * Failures are reported in the result body rather than thrown.
 */
export async function executeContentAwareResize(
  args: ContentAwareResizeArgs,
  context: ToolContext,
  config: Config,
): Promise<ToolResult> {
  const { log } = context;
  const progressReports: Promise<void>[] = [];

  try {
    log.info('Starting content-aware resize', { inputPath: args.inputPath });

    const writesFile = args.outputType === 'file' || args.outputType === 'combine';
    if ((writesFile || args.debug) && (!args.outputPath || !path.isAbsolute(args.outputPath))) {
      return failure('outputPath must be an absolute path when outputType is "file" or "combine" or debug is enabled');
    }
    const outputPath = args.outputPath ?? '';

    if (!path.isAbsolute(args.inputPath)) {
      return failure('inputPath must be an absolute path');
    }
    const ext = path.extname(args.inputPath).toLowerCase();
    if (!SUPPORTED_INPUT_EXTENSIONS.includes(ext)) {
      return failure(`Unsupported image format: ${ext}. Supported: ${SUPPORTED_INPUT_EXTENSIONS.join(', ')}`);
    }

    // 1. Decode
    const source = await decodeImage(args.inputPath, { limitInputPixels: config.maxInputPixels });
    log.info('Decoded source image', { width: source.width, height: source.height });

    // 2. Resolve targets
    const target = resolveTargetDimensions(source, {
      width: args.width,
      height: args.height,
      keepAspect: args.keepAspect,
    });
    const energy = resolveEnergyComputer(args.energy);

    if (target.width < source.width) {
      log.info(`Removing ${source.width - target.width} vertical seams to reach width ${target.width}`);
    }
    if (target.height < source.height) {
      log.info(`Removing ${source.height - target.height} horizontal seams to reach height ${target.height}`);
    }

    // 3. Carve
    const seamsTotal = (source.width - target.width) + (source.height - target.height);
    const reportEvery = Math.max(1, Math.ceil(seamsTotal / MAX_PROGRESS_REPORTS));
    // Carving is driven seam by seam so notifications go out while it runs
    const steps = carveSteps(source, { targetWidth: target.width, targetHeight: target.height, energy });
    let step = steps.next();
    while (!step.done) {
      const progress = step.value;
      if (progress.seamsRemoved % reportEvery === 0 || progress.seamsRemoved === progress.seamsTotal) {
        log.debug('Carving progress', {
          phase: progress.phase,
          seamsRemoved: progress.seamsRemoved,
          width: progress.width,
          height: progress.height,
        });
        progressReports.push(
          context.reportProgress({ progress: progress.seamsRemoved, total: progress.seamsTotal })
            .catch((err: unknown) => {
              log.warn('Progress notification failed', { error: errorMessage(err) });
            }),
        );
        await yieldToEventLoop();
      }
      step = steps.next();
    }
    const carved = step.value;
    await Promise.all(progressReports);
    log.info('Resized image', { width: carved.width, height: carved.height });

    // Debug: energy map of the source
    if (args.debug) {
      const energyImage = await encodeImage(energyToPixelBuffer(energy.compute(source)), 'png');
      const saved = await writeWithFallback(
        outputPath,
        `${args.outputFileName}_debug_energy.png`,
        energyImage,
        config.fallbackOutputDir,
        log,
      );
      log.info('Saved debug energy map', { path: saved.filePath, energy: energy.name });
    }

    // 4. Encode
    const encoded = await encodeImage(carved, args.outputFormat);

    const result: ContentAwareResizeOutput = {
      success: true,
      width: carved.width,
      height: carved.height,
      originalWidth: source.width,
      originalHeight: source.height,
      seamsRemoved: seamsTotal,
      format: args.outputFormat,
      message: seamsTotal === 0
        ? 'Image already at the requested size; no seams removed.'
        : `Removed ${seamsTotal} seams.`,
    };

    // 5. Save file
    if (writesFile) {
      const saved = await writeWithFallback(
        outputPath,
        withExtension(args.outputFileName, args.outputFormat),
        encoded,
        config.fallbackOutputDir,
        log,
      );
      result.filePath = saved.filePath;
      if (saved.warning) result.warning = saved.warning;
    }

    log.info('Content-aware resize completed successfully');

    // 6. Inline image
    if (args.outputType === 'base64' || args.outputType === 'combine') {
      const base64 = encoded.toString('base64');
      const mimeType = MIME_TYPES[args.outputFormat];
      result.base64 = base64;
      result.mimeType = mimeType;
      return {
        content: [
          { type: 'text', text: JSON.stringify(result, null, 2) },
          { type: 'image', data: base64, mimeType },
        ],
      };
    }

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    await Promise.allSettled(progressReports);
    const message = errorMessage(error);
    log.error('Content-aware resize failed', { error: message });

    if (error instanceof InvalidTargetError) {
      return failure(`Invalid target: ${message}`);
    }
    return failure(`Resize failed: ${message}`);
  }
}
