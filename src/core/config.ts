import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../renamer/errors.js';

export const COVER_MODES = ['text', 'image', 'auto'] as const;
export type CoverMode = typeof COVER_MODES[number];

export const DEFAULT_MODEL_ID = 'gemini-2.0-flash';
export const DEFAULT_INPUT_DIR = '未整理';
export const DEFAULT_OUTPUT_DIR = '已整理';

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  GEMINI_API_KEY: z
    .string({ required_error: 'GEMINI_API_KEY is not set.' })
    .trim()
    .min(1, 'GEMINI_API_KEY is not set.'),
  GEMINI_MODEL_ID: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  PDF_RENAMER_INPUT_DIR: z.string().trim().min(1).default(DEFAULT_INPUT_DIR),
  PDF_RENAMER_OUTPUT_DIR: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  COVER_MODE: z.enum(COVER_MODES).default('auto'),
  MIN_COVER_TEXT_LENGTH: intFromEnv(40, 0),
  MAX_TITLE_LENGTH: intFromEnv(40, 1),
  REQUEST_TIMEOUT_MS: intFromEnv(60000, 1),
  REQUEST_DELAY_MS: intFromEnv(1000, 0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Settings for one batch run. Built once at start-up and passed down
 * explicitly; nothing below the CLI reads process.env.
 */
export interface RenamerConfig {
  apiKey: string;
  modelId: string;
  inputDir: string;
  outputDir: string;
  coverMode: CoverMode;
  minCoverTextLength: number;
  maxTitleLength: number;
  requestTimeoutMs: number;
  requestDelayMs: number;
  logLevel: string;
}

export interface ConfigOverrides {
  inputDir?: string;
  outputDir?: string;
}

// Blank values in .env ("FOO=") count as unset so defaults still apply
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): RenamerConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    apiKey: values.GEMINI_API_KEY,
    modelId: values.GEMINI_MODEL_ID,
    inputDir: path.resolve(cwd, overrides.inputDir ?? values.PDF_RENAMER_INPUT_DIR),
    outputDir: path.resolve(cwd, overrides.outputDir ?? values.PDF_RENAMER_OUTPUT_DIR),
    coverMode: values.COVER_MODE,
    minCoverTextLength: values.MIN_COVER_TEXT_LENGTH,
    maxTitleLength: values.MAX_TITLE_LENGTH,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    requestDelayMs: values.REQUEST_DELAY_MS,
    logLevel: values.LOG_LEVEL,
  };
}
