import type { StageError } from './errors.js';

export type Region = 'WW' | 'CN';

export interface InferredFields {
  readonly industry: string;
  readonly region: Region;
  readonly title: string;
  readonly institution: string;
  /** YYMMDD */
  readonly date: string;
}

export interface CoverContent {
  /** First-page text, whitespace collapsed. Empty when the page has no text layer. */
  text: string;
  pageCount: number;
  /** Single-page PDF holding only the cover */
  coverPdf: Uint8Array;
}

export type RecordStatus =
  | 'pending'
  | 'extracted'
  | 'inferred'
  | 'formatted'
  | 'previewed'
  | 'moved'
  | 'skipped';

export type TerminalStatus = Extract<RecordStatus, 'previewed' | 'moved' | 'skipped'>;

export type RunMode = 'preview' | 'execute';

export interface DocumentRecord {
  sourcePath: string;
  status: RecordStatus;
  cover?: CoverContent;
  inferredFields?: InferredFields;
  targetPath?: string;
  skipReason?: string;
  error?: StageError;
}

export interface BatchReport {
  mode: RunMode;
  inputDir: string;
  outputDir: string;
  records: DocumentRecord[];
  startedAt: Date;
  finishedAt: Date;
}

const TRANSITIONS: Record<RecordStatus, readonly RecordStatus[]> = {
  pending: ['extracted', 'skipped'],
  extracted: ['inferred', 'skipped'],
  inferred: ['formatted', 'skipped'],
  formatted: ['previewed', 'moved', 'skipped'],
  previewed: [],
  moved: [],
  skipped: [],
};

export function canTransition(from: RecordStatus, to: RecordStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function advance(record: DocumentRecord, to: RecordStatus): void {
  if (!canTransition(record.status, to)) {
    throw new Error(`Illegal status transition ${record.status} -> ${to} for ${record.sourcePath}`);
  }
  record.status = to;
}

export function isTerminal(status: RecordStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0;
}
