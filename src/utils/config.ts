/**
 * Server configuration from environment variables.
 */

import { z } from 'zod';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_FALLBACK_OUTPUT = path.resolve(__dirname, '..', '..', 'fallback-output');

const EnvSchema = z.object({
  SEAMCARVE_FALLBACK_OUTPUT: z.string().min(1).optional()
    .describe('Directory used when the requested output path is not writable'),
  SEAMCARVE_MAX_INPUT_PIXELS: z.coerce.number().int().min(1).default(4096 * 4096)
    .describe('Largest accepted input image, in pixels'),
});

export interface Config {
  fallbackOutputDir: string;
  maxInputPixels: number;
}

/**
 * Read and validate configuration.
 * @param env - Environment to read, process.env by default
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    fallbackOutputDir: parsed.data.SEAMCARVE_FALLBACK_OUTPUT ?? DEFAULT_FALLBACK_OUTPUT,
    maxInputPixels: parsed.data.SEAMCARVE_MAX_INPUT_PIXELS,
  };
}
