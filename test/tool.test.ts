import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { beforeAll, describe, expect, test } from 'vitest';
import {
  ContentAwareResizeParams,
  executeContentAwareResize,
  type ToolContext,
  type ToolResult,
} from '../src/tool.js';
import type { Config } from '../src/utils/config.js';
import { ensureFixtureImage } from './helpers/fixtures.js';
import { fallbackDir, fixturesDir, outputDir } from './helpers/paths.js';

const config: Config = {
  fallbackOutputDir: fallbackDir,
  maxInputPixels: 1_000_000,
};

interface RecordingContext extends ToolContext {
  messages: { level: string; message: string }[];
  progress: { progress: number; total?: number }[];
}

function createContext(): RecordingContext {
  const messages: { level: string; message: string }[] = [];
  const progress: { progress: number; total?: number }[] = [];
  const record = (level: string) => (message: string) => {
    messages.push({ level, message });
  };
  return {
    messages,
    progress,
    log: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
    reportProgress: async (p) => {
      progress.push(p);
    },
  };
}

function parseResult(result: ToolResult): Record<string, unknown> {
  const textItem = result.content.find((item) => item.type === 'text');
  if (!textItem || textItem.type !== 'text') {
    throw new Error('Tool result missing text content');
  }
  return JSON.parse(textItem.text);
}

describe('content_aware_resize', () => {
  let inputPath = '';

  beforeAll(async () => {
    await fs.mkdir(outputDir, { recursive: true });
    inputPath = await ensureFixtureImage('pattern-12x10', 12, 10);
  });

  test('writes a narrower image to outputPath', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_width',
      outputType: 'file',
      outputPath: outputDir,
      width: 8,
    });

    const result = await executeContentAwareResize(args, createContext(), config);
    const parsed = parseResult(result);

    expect(result.content).toHaveLength(1);
    expect(parsed).toMatchObject({
      success: true,
      width: 8,
      height: 10,
      originalWidth: 12,
      originalHeight: 10,
      seamsRemoved: 4,
      format: 'png',
      message: 'Removed 4 seams.',
      filePath: path.resolve(outputDir, 'carved_width.png'),
    });

    const metadata = await sharp(path.resolve(outputDir, 'carved_width.png')).metadata();
    expect(metadata.width).toBe(8);
    expect(metadata.height).toBe(10);
  });

  test('returns inline base64 image content', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_inline',
      outputType: 'base64',
      height: 7,
    });

    const result = await executeContentAwareResize(args, createContext(), config);
    const parsed = parseResult(result);
    const image = result.content[1];

    expect(parsed.success).toBe(true);
    expect(parsed.filePath).toBeUndefined();
    expect(parsed.mimeType).toBe('image/png');
    expect(image.type).toBe('image');
    if (image.type !== 'image') return;
    expect(image.data).toBe(parsed.base64);
    const metadata = await sharp(Buffer.from(image.data, 'base64')).metadata();
    expect(metadata.width).toBe(12);
    expect(metadata.height).toBe(7);
  });

  test('reports progress for every seam on small jobs', async () => {
    const context = createContext();
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_both',
      outputType: 'base64',
      outputFormat: 'jpg',
      width: 8,
      height: 6,
    });

    const parsed = parseResult(await executeContentAwareResize(args, context, config));

    expect(parsed).toMatchObject({ success: true, width: 8, height: 6, seamsRemoved: 8, mimeType: 'image/jpeg' });
    expect(context.progress).toHaveLength(8);
    expect(context.progress[7]).toEqual({ progress: 8, total: 8 });
    expect(context.messages).toContainEqual({ level: 'info', message: 'Removing 4 vertical seams to reach width 8' });
    expect(context.messages).toContainEqual({ level: 'info', message: 'Removing 4 horizontal seams to reach height 6' });
  });

  test('sends progress before carving finishes', async () => {
    const context = createContext();
    const recordProgress = context.reportProgress;
    let reportedAtFirstTick: number | undefined;
    context.reportProgress = (p) => {
      if (context.progress.length === 0) {
        setImmediate(() => {
          reportedAtFirstTick = context.progress.length;
        });
      }
      return recordProgress(p);
    };
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_interleaved',
      outputType: 'base64',
      width: 8,
      height: 6,
    });

    const parsed = parseResult(await executeContentAwareResize(args, context, config));

    expect(parsed.success).toBe(true);
    expect(reportedAtFirstTick).toBe(1);
    expect(context.progress).toHaveLength(8);
  });

  test('keeps going when a progress notification fails', async () => {
    const context = createContext();
    context.reportProgress = async () => {
      throw new Error('client disconnected');
    };
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_no_progress',
      outputType: 'base64',
      width: 10,
    });

    const parsed = parseResult(await executeContentAwareResize(args, context, config));

    expect(parsed).toMatchObject({ success: true, width: 10, height: 10 });
    expect(context.messages).toContainEqual({ level: 'warn', message: 'Progress notification failed' });
  });

  test('keeps a .jpeg file name for jpg output', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_photo.jpeg',
      outputType: 'file',
      outputPath: outputDir,
      outputFormat: 'jpg',
      width: 10,
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed.filePath).toBe(path.resolve(outputDir, 'carved_photo.jpeg'));
    const metadata = await sharp(path.resolve(outputDir, 'carved_photo.jpeg')).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(10);
  });

  test('keeps the aspect ratio when asked', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_aspect',
      outputType: 'base64',
      width: 6,
      keepAspect: true,
      energy: 'gradient',
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed).toMatchObject({ success: true, width: 6, height: 5, seamsRemoved: 11 });
  });

  test('writes the energy map in debug mode', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_debug',
      outputType: 'file',
      outputPath: outputDir,
      width: 11,
      debug: true,
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed.success).toBe(true);
    const metadata = await sharp(path.resolve(outputDir, 'carved_debug_debug_energy.png')).metadata();
    expect(metadata.width).toBe(12);
    expect(metadata.height).toBe(10);
  });

  test('rejects enlargement without writing anything', async () => {
    const context = createContext();
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_too_wide',
      outputType: 'file',
      outputPath: outputDir,
      width: 20,
    });

    const parsed = parseResult(await executeContentAwareResize(args, context, config));

    expect(parsed).toEqual({
      success: false,
      message: 'Invalid target: Target width 20 exceeds the original width 12; enlarging is not supported',
      width: 0,
      height: 0,
      format: '',
    });
    await expect(fs.access(path.resolve(outputDir, 'carved_too_wide.png'))).rejects.toThrow();
    expect(context.progress).toHaveLength(0);
    expect(context.messages.at(-1)?.level).toBe('error');
  });

  test('requires a width or height', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_none',
      outputType: 'base64',
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed.message).toBe('Invalid target: Provide width and/or height');
  });

  test('requires an absolute outputPath for file output', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_nopath',
      outputType: 'combine',
      width: 8,
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed.success).toBe(false);
    expect(parsed.message).toBe(
      'outputPath must be an absolute path when outputType is "file" or "combine" or debug is enabled',
    );
  });

  test('rejects unsupported input formats', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath: path.resolve(fixturesDir, 'pattern.gif'),
      outputFileName: 'carved_gif',
      outputType: 'base64',
      width: 8,
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed.message).toBe('Unsupported image format: .gif. Supported: .png, .jpg, .jpeg, .webp');
  });

  test('reports a missing input file as a failure', async () => {
    const args = ContentAwareResizeParams.parse({
      inputPath: path.resolve(fixturesDir, 'does-not-exist.png'),
      outputFileName: 'carved_missing',
      outputType: 'base64',
      width: 8,
    });

    const parsed = parseResult(await executeContentAwareResize(args, createContext(), config));

    expect(parsed.success).toBe(false);
    expect(String(parsed.message)).toMatch(/^Resize failed: /);
  });

  test('falls back when outputPath is not writable', async () => {
    const context = createContext();
    // A directory cannot be created beneath a regular file
    const blocked = path.resolve(inputPath, 'nested');
    const args = ContentAwareResizeParams.parse({
      inputPath,
      outputFileName: 'carved_fallback',
      outputType: 'file',
      outputPath: blocked,
      width: 10,
    });

    const parsed = parseResult(await executeContentAwareResize(args, context, config));

    expect(parsed.success).toBe(true);
    expect(path.dirname(String(parsed.filePath))).toBe(fallbackDir);
    expect(parsed.warning).toBe(`Requested path not writable; saved to fallback: ${parsed.filePath}`);
    expect(context.messages.map((m) => m.level)).toContain('warn');
    const metadata = await sharp(String(parsed.filePath)).metadata();
    expect(metadata.width).toBe(10);
  });
});
