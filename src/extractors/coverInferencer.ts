import type { Part } from '@google/generative-ai';
import type { CoverMode } from '../core/config.js';
import type { CoverModel } from '../modelGemini.js';
import { InferenceError, describeError } from '../renamer/errors.js';
import type { CoverContent, InferredFields } from '../renamer/types.js';
import {
  CoverFieldsSchema,
  RawCoverMetadataSchema,
  missingRequiredFields,
} from '../schemas/coverMetadata.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

export type InferenceResult =
  | { ok: true; fields: InferredFields }
  | { ok: false; error: InferenceError };

export const COVER_PROMPT = `
Analyze this research report cover page. Extract the following information to rename the file.
Return ONLY a raw JSON object (no markdown formatting) with these keys:
- "industry": The main industry application (e.g., AI, ADAS, Semi, DRAM, Auto, EV). Keep it short.
- "region": "WW" for Worldwide/Global, "CN" for China. Default to "WW" if unclear but looks global.
- "title": Comprehend the report content and generate a concise, impactful title in Traditional Chinese (繁體中文). Ensure it is NOT URL-encoded.
- "institution": The research institution or bank name (short abbreviation if possible, e.g. MS for Morgan Stanley, GS for Goldman Sachs, CICC).
- "date": Date of the report in YYMMDD format (e.g., 220625 for June 25, 2022).

Example JSON:
{
  "industry": "ADAS",
  "region": "WW",
  "title": "車載傳感器市場分析",
  "institution": "MS",
  "date": "220625"
}
`;

export interface CoverInferencerOptions {
  coverMode: CoverMode;
  minCoverTextLength: number;
  /** Total attempts per file; 2 means one retry */
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

/**
 * Pull the JSON object out of a model answer, tolerating ```json fences
 * and chatter around the object.
 */
export function extractJsonObject(text: string): unknown {
  let body = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(body);
  if (fenced) {
    body = fenced[1];
  }
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new InferenceError('INFERENCE_MALFORMED_RESPONSE', 'No JSON object found in model response');
  }
  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    throw new InferenceError('INFERENCE_MALFORMED_RESPONSE', `Invalid JSON response from model: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Validate a model answer into InferredFields without ever assuming a field is there.
 */
export function parseCoverResponse(text: string): InferenceResult {
  let json: unknown;
  try {
    json = extractJsonObject(text);
  } catch (error) {
    if (error instanceof InferenceError) return { ok: false, error };
    throw error;
  }

  const raw = RawCoverMetadataSchema.safeParse(json);
  if (!raw.success) {
    return {
      ok: false,
      error: new InferenceError('INFERENCE_MALFORMED_RESPONSE', `Unexpected response shape: ${raw.error.issues.map(i => i.message).join('; ')}`),
    };
  }

  const missing = missingRequiredFields(raw.data);
  if (missing.length > 0) {
    return {
      ok: false,
      error: new InferenceError('INFERENCE_MISSING_FIELDS', `Missing required fields: ${missing.join(', ')}`),
    };
  }

  const fields = CoverFieldsSchema.safeParse(raw.data);
  if (!fields.success) {
    return {
      ok: false,
      error: new InferenceError('INFERENCE_INVALID_FIELDS', fields.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')),
    };
  }
  return { ok: true, fields: fields.data };
}

export function countVisibleCharacters(text: string): number {
  return text.replace(/\s/g, '').length;
}

export class CoverInferencer {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly model: CoverModel,
    private readonly options: CoverInferencerOptions
  ) {
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Decide whether the model sees the cover text or the cover page itself.
   */
  buildParts(cover: CoverContent): Array<string | Part> {
    const useText =
      this.options.coverMode === 'text' ||
      (this.options.coverMode === 'auto' &&
        countVisibleCharacters(cover.text) >= this.options.minCoverTextLength);

    if (useText) {
      return [COVER_PROMPT, `Cover page text:\n${cover.text}`];
    }
    return [
      COVER_PROMPT,
      {
        inlineData: {
          mimeType: 'application/pdf',
          data: Buffer.from(cover.coverPdf).toString('base64'),
        },
      },
    ];
  }

  async infer(cover: CoverContent, logger: Logger = this.logger): Promise<InferenceResult> {
    const parts = this.buildParts(cover);
    logger.debug({ model: this.model.name, input: typeof parts[1] === 'string' ? 'text' : 'page' }, 'requesting cover metadata');

    try {
      return await withRetry(
        async attempt => {
          let text: string;
          try {
            text = await this.model.generate(parts);
          } catch (error) {
            throw new InferenceError('INFERENCE_REQUEST_FAILED', `Model request failed: ${describeError(error)}`, { cause: error });
          }
          logger.debug({ attempt, response: text }, 'model responded');

          const result = parseCoverResponse(text);
          if (!result.ok && result.error.retriable) {
            throw result.error;
          }
          return result;
        },
        {
          attempts: this.maxAttempts,
          baseDelayMs: this.retryDelayMs,
          shouldRetry: error => error instanceof InferenceError && error.retriable,
          onRetry: (error, attempt) =>
            logger.warn({ attempt, reason: describeError(error) }, 'cover inference failed, retrying'),
        }
      );
    } catch (error) {
      if (error instanceof InferenceError) {
        return { ok: false, error };
      }
      throw error;
    }
  }
}
