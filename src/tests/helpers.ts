import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { CoverModel } from '../modelGemini.js';
import type { InferredFields } from '../renamer/types.js';

export async function makePdf(options: { text?: string; pages?: number } = {}): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const pages = options.pages ?? 1;
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (let i = 0; i < pages; i++) {
    const page = doc.addPage([595, 842]);
    if (i === 0 && options.text) {
      page.drawText(options.text, { x: 50, y: 700, size: 18, font });
    }
  }
  return doc.save({ addDefaultPage: false });
}

/**
 * A PDF whose trailer carries an /Encrypt dictionary, which readers must
 * treat as password protected.
 */
export async function makeEncryptedPdf(): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.addPage([595, 842]);
  doc.context.trailerInfo.Encrypt = doc.context.register(
    doc.context.obj({ Filter: 'Standard', V: 1, R: 2, Length: 40 })
  );
  return doc.save({ useObjectStreams: false });
}

export function makeTempDir(prefix = 'cover-renamer-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function listDir(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}

export const SAMPLE_FIELDS: InferredFields = Object.freeze({
  industry: 'AI',
  region: 'WW',
  title: '生成式AI未來展望',
  institution: 'MS',
  date: '250916',
});

/**
 * CoverModel that replays canned answers in order; an Error entry is thrown.
 */
export class ScriptedModel implements CoverModel {
  readonly name = 'scripted-model';
  readonly calls: Array<Array<unknown>> = [];

  constructor(private readonly answers: Array<string | Error>) {}

  async generate(parts: Array<unknown>): Promise<string> {
    this.calls.push(parts);
    const next = this.answers[Math.min(this.calls.length - 1, this.answers.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }
}
