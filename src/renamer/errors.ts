/**
 * Error taxonomy for the rename pipeline.
 *
 * Every per-file failure is one of the four stage errors below; the
 * orchestrator records it on the document and moves on. Only ConfigError
 * is fatal, and it is raised before a batch starts.
 */

export type ExtractionErrorCode =
  | 'EXTRACTION_UNREADABLE'
  | 'EXTRACTION_CORRUPT'
  | 'EXTRACTION_ENCRYPTED'
  | 'EXTRACTION_NO_PAGES';

export type InferenceErrorCode =
  | 'INFERENCE_REQUEST_FAILED'
  | 'INFERENCE_MALFORMED_RESPONSE'
  | 'INFERENCE_MISSING_FIELDS'
  | 'INFERENCE_INVALID_FIELDS';

export type FormatErrorCode =
  | 'FORMAT_EMPTY_COMPONENT'
  | 'FORMAT_COLLISION_UNRESOLVED';

export type FilesystemErrorCode =
  | 'FS_DESTINATION_EXISTS'
  | 'FS_MOVE_FAILED';

export type RenamerErrorCode =
  | ExtractionErrorCode
  | InferenceErrorCode
  | FormatErrorCode
  | FilesystemErrorCode
  | 'CONFIG_INVALID';

interface RenamerErrorOptions {
  cause?: unknown;
  retriable?: boolean;
}

export abstract class RenamerError<C extends RenamerErrorCode = RenamerErrorCode> extends Error {
  readonly code: C;
  readonly retriable: boolean;

  protected constructor(code: C, message: string, options: RenamerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retriable = options.retriable ?? false;
  }
}

export class ExtractionError extends RenamerError<ExtractionErrorCode> {
  constructor(code: ExtractionErrorCode, message: string, options?: RenamerErrorOptions) {
    super(code, message, options);
  }
}

export class InferenceError extends RenamerError<InferenceErrorCode> {
  constructor(code: InferenceErrorCode, message: string, options: RenamerErrorOptions = {}) {
    super(code, message, {
      ...options,
      retriable:
        options.retriable ??
        (code === 'INFERENCE_REQUEST_FAILED' || code === 'INFERENCE_MALFORMED_RESPONSE'),
    });
  }
}

export class FormatError extends RenamerError<FormatErrorCode> {
  constructor(code: FormatErrorCode, message: string, options?: RenamerErrorOptions) {
    super(code, message, options);
  }
}

export class FilesystemError extends RenamerError<FilesystemErrorCode> {
  constructor(code: FilesystemErrorCode, message: string, options?: RenamerErrorOptions) {
    super(code, message, options);
  }
}

export class ConfigError extends RenamerError<'CONFIG_INVALID'> {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', message);
    this.issues = issues;
  }
}

export type StageError = ExtractionError | InferenceError | FormatError | FilesystemError;

export function isStageError(error: unknown): error is StageError {
  return (
    error instanceof ExtractionError ||
    error instanceof InferenceError ||
    error instanceof FormatError ||
    error instanceof FilesystemError
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
