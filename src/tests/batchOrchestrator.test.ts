import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PdfCoverExtractor, type CoverExtractor } from '../extractors/coverExtractor.js';
import type { InferenceResult } from '../extractors/coverInferencer.js';
import {
  BatchOrchestrator,
  type BatchOptions,
  type FileSystemOps,
  type MetadataInferencer,
  nodeFileSystem,
} from '../renamer/batchOrchestrator.js';
import { ExtractionError, FilesystemError, InferenceError } from '../renamer/errors.js';
import type { CoverContent, InferredFields } from '../renamer/types.js';
import { SAMPLE_FIELDS, listDir, makePdf, makeTempDir, removeDir } from './helpers.js';

/** Cover text is the file's base name, so the fake inferencer can look it up */
class NameExtractor implements CoverExtractor {
  async extract(pdfPath: string): Promise<CoverContent> {
    const name = path.basename(pdfPath, '.pdf');
    if (name.startsWith('corrupt')) {
      throw new ExtractionError('EXTRACTION_CORRUPT', 'Not a readable PDF');
    }
    return { text: name, pageCount: 1, coverPdf: new Uint8Array() };
  }
}

class TableInferencer implements MetadataInferencer {
  readonly seen: string[] = [];

  constructor(private readonly table: Record<string, InferredFields | InferenceError>) {}

  async infer(cover: CoverContent): Promise<InferenceResult> {
    this.seen.push(cover.text);
    const entry = this.table[cover.text];
    if (entry === undefined) {
      return { ok: false, error: new InferenceError('INFERENCE_MISSING_FIELDS', `Missing required fields: title`) };
    }
    return entry instanceof InferenceError ? { ok: false, error: entry } : { ok: true, fields: entry };
  }
}

const EV_FIELDS: InferredFields = {
  industry: 'EV',
  region: 'CN',
  title: '電動車供應鏈',
  institution: 'CICC',
  date: '231130',
};

describe('BatchOrchestrator', () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    root = makeTempDir();
    inputDir = path.join(root, 'in');
    outputDir = path.join(root, 'out');
    fs.mkdirSync(inputDir);
    fs.mkdirSync(outputDir);
  });

  afterEach(() => {
    removeDir(root);
  });

  function touch(dir: string, name: string, content = '%PDF-1.7 placeholder'): void {
    fs.writeFileSync(path.join(dir, name), content);
  }

  function orchestrator(
    mode: BatchOptions['mode'],
    inferencer: MetadataInferencer,
    extras: { extractor?: CoverExtractor; fileSystem?: FileSystemOps; wait?: (ms: number) => Promise<void> } = {}
  ): BatchOrchestrator {
    return new BatchOrchestrator(
      { inputDir, outputDir, mode, requestDelayMs: 0 },
      { extractor: extras.extractor ?? new NameExtractor(), inferencer, fileSystem: extras.fileSystem, wait: extras.wait }
    );
  }

  it('lists only PDF files, sorted', async () => {
    touch(inputDir, 'b.pdf');
    touch(inputDir, 'a.PDF');
    touch(inputDir, 'notes.txt');
    touch(inputDir, '.hidden.pdf');
    fs.mkdirSync(path.join(inputDir, 'folder.pdf'));

    const files = await orchestrator('preview', new TableInferencer({})).listInputFiles();
    expect(files).toEqual([path.join(inputDir, 'a.PDF'), path.join(inputDir, 'b.pdf')]);
  });

  it('previews renames without touching the disk', async () => {
    touch(inputDir, 'ms-report.pdf');
    touch(inputDir, 'cicc-ev.pdf');
    const before = { input: listDir(inputDir), output: listDir(outputDir) };

    const report = await orchestrator(
      'preview',
      new TableInferencer({ 'ms-report': SAMPLE_FIELDS, 'cicc-ev': EV_FIELDS })
    ).run();

    expect(report.records.map(r => [path.basename(r.sourcePath), r.status, r.targetPath && path.basename(r.targetPath)])).toEqual([
      ['cicc-ev.pdf', 'previewed', 'EV-CN-電動車供應鏈-CICC-231130.pdf'],
      ['ms-report.pdf', 'previewed', 'AI-WW-生成式AI未來展望-MS-250916.pdf'],
    ]);
    expect({ input: listDir(inputDir), output: listDir(outputDir) }).toEqual(before);
  });

  it('moves files in execute mode', async () => {
    touch(inputDir, 'ms-report.pdf', 'cover bytes');

    const report = await orchestrator('execute', new TableInferencer({ 'ms-report': SAMPLE_FIELDS })).run();

    expect(report.records[0].status).toBe('moved');
    expect(listDir(inputDir)).toEqual([]);
    expect(listDir(outputDir)).toEqual(['AI-WW-生成式AI未來展望-MS-250916.pdf']);
    expect(fs.readFileSync(path.join(outputDir, 'AI-WW-生成式AI未來展望-MS-250916.pdf'), 'utf8')).toBe('cover bytes');
  });

  it('finds nothing to move on a second execute run', async () => {
    touch(inputDir, 'ms-report.pdf');
    const inferencer = new TableInferencer({ 'ms-report': SAMPLE_FIELDS });

    await orchestrator('execute', inferencer).run();
    const second = await orchestrator('execute', inferencer).run();

    expect(second.records).toEqual([]);
    expect(inferencer.seen).toEqual(['ms-report']);
    expect(listDir(outputDir)).toEqual(['AI-WW-生成式AI未來展望-MS-250916.pdf']);
  });

  it('gives identical inferences unique names within a batch', async () => {
    touch(inputDir, 'copy-a.pdf', 'a');
    touch(inputDir, 'copy-b.pdf', 'b');

    await orchestrator('execute', new TableInferencer({ 'copy-a': SAMPLE_FIELDS, 'copy-b': SAMPLE_FIELDS })).run();

    expect(listDir(outputDir)).toEqual([
      'AI-WW-生成式AI未來展望-MS-250916.pdf',
      'AI-WW-生成式AI未來展望-MS-250916_1.pdf',
    ]);
    expect(fs.readFileSync(path.join(outputDir, 'AI-WW-生成式AI未來展望-MS-250916_1.pdf'), 'utf8')).toBe('b');
  });

  it('never overwrites a file left by an earlier run', async () => {
    touch(outputDir, 'AI-WW-生成式AI未來展望-MS-250916.pdf', 'earlier');
    touch(inputDir, 'ms-report.pdf', 'new');

    const report = await orchestrator('preview', new TableInferencer({ 'ms-report': SAMPLE_FIELDS })).run();

    expect(path.basename(report.records[0].targetPath ?? '')).toBe('AI-WW-生成式AI未來展望-MS-250916_1.pdf');
    expect(fs.readFileSync(path.join(outputDir, 'AI-WW-生成式AI未來展望-MS-250916.pdf'), 'utf8')).toBe('earlier');
  });

  it('skips a corrupt file and carries on', async () => {
    touch(inputDir, 'corrupt-scan.pdf');
    touch(inputDir, 'ms-report.pdf');

    const report = await orchestrator('execute', new TableInferencer({ 'ms-report': SAMPLE_FIELDS })).run();

    const [corrupt, good] = report.records;
    expect(corrupt.status).toBe('skipped');
    expect(corrupt.error).toBeInstanceOf(ExtractionError);
    expect(corrupt.targetPath).toBeUndefined();
    expect(good.status).toBe('moved');
    expect(listDir(inputDir)).toEqual(['corrupt-scan.pdf']);
  });

  it('skips real corrupt and zero-page PDFs with ExtractionError', async () => {
    fs.writeFileSync(path.join(inputDir, 'a-garbage.pdf'), 'not a pdf');
    fs.writeFileSync(path.join(inputDir, 'b-empty.pdf'), await makePdf({ pages: 0 }));
    fs.writeFileSync(path.join(inputDir, 'c-cover.pdf'), await makePdf({ text: 'Goldman Sachs Equity Research' }));
    const inferencer: MetadataInferencer = {
      infer: vi.fn(async (): Promise<InferenceResult> => ({ ok: true, fields: SAMPLE_FIELDS })),
    };

    const report = await orchestrator('execute', inferencer, { extractor: new PdfCoverExtractor() }).run();

    expect(report.records.map(r => [r.status, r.error?.code])).toEqual([
      ['skipped', 'EXTRACTION_CORRUPT'],
      ['skipped', 'EXTRACTION_NO_PAGES'],
      ['moved', undefined],
    ]);
    expect(inferencer.infer).toHaveBeenCalledTimes(1);
  });

  it('skips records whose inference failed without computing a target', async () => {
    touch(inputDir, 'unknown.pdf');

    const report = await orchestrator('execute', new TableInferencer({})).run();

    expect(report.records[0]).toMatchObject({
      status: 'skipped',
      skipReason: 'Missing required fields: title',
    });
    expect(report.records[0].targetPath).toBeUndefined();
    expect(listDir(inputDir)).toEqual(['unknown.pdf']);
  });

  it('moves already-named files out of a separate input folder', async () => {
    touch(inputDir, 'AI-WW-生成式AI未來展望-MS-250916.pdf');
    const inferencer = new TableInferencer({ 'AI-WW-生成式AI未來展望-MS-250916': SAMPLE_FIELDS });

    const report = await orchestrator('execute', inferencer).run();

    expect(report.records[0].status).toBe('moved');
    expect(listDir(inputDir)).toEqual([]);
    expect(listDir(outputDir)).toEqual(['AI-WW-生成式AI未來展望-MS-250916.pdf']);
  });

  it('leaves already-named files alone when input and output are the same folder', async () => {
    touch(inputDir, 'AI-WW-生成式AI未來展望-MS-250916.pdf');
    touch(inputDir, 'ms-report.pdf');
    const inferencer = new TableInferencer({ 'ms-report': EV_FIELDS });

    const report = await new BatchOrchestrator(
      { inputDir, outputDir: inputDir, mode: 'execute', requestDelayMs: 0 },
      { extractor: new NameExtractor(), inferencer }
    ).run();

    expect(report.records.map(r => [path.basename(r.sourcePath), r.status, r.skipReason])).toEqual([
      ['AI-WW-生成式AI未來展望-MS-250916.pdf', 'skipped', 'already named'],
      ['ms-report.pdf', 'moved', undefined],
    ]);
    expect(inferencer.seen).toEqual(['ms-report']);
    expect(listDir(inputDir)).toEqual(['AI-WW-生成式AI未來展望-MS-250916.pdf', 'EV-CN-電動車供應鏈-CICC-231130.pdf']);
  });

  it('records a failed move and continues with the next file', async () => {
    touch(inputDir, 'cicc-ev.pdf');
    touch(inputDir, 'ms-report.pdf');
    const fileSystem: FileSystemOps = {
      exists: nodeFileSystem.exists,
      move: async (source, target) => {
        if (source.endsWith('cicc-ev.pdf')) {
          throw new FilesystemError('FS_MOVE_FAILED', 'Could not move cicc-ev.pdf: EACCES: permission denied');
        }
        await nodeFileSystem.move(source, target);
      },
    };

    const report = await orchestrator(
      'execute',
      new TableInferencer({ 'ms-report': SAMPLE_FIELDS, 'cicc-ev': EV_FIELDS }),
      { fileSystem }
    ).run();

    expect(report.records.map(r => [r.status, r.error?.code])).toEqual([
      ['skipped', 'FS_MOVE_FAILED'],
      ['moved', undefined],
    ]);
    expect(listDir(inputDir)).toEqual(['cicc-ev.pdf']);
  });

  it('waits between model calls', async () => {
    touch(inputDir, 'a.pdf');
    touch(inputDir, 'b.pdf');
    touch(inputDir, 'c.pdf');
    const wait = vi.fn(async () => {});

    await new BatchOrchestrator(
      { inputDir, outputDir, mode: 'preview', requestDelayMs: 1000 },
      { extractor: new NameExtractor(), inferencer: new TableInferencer({}), wait }
    ).run();

    expect(wait).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledWith(1000);
  });
});

describe('nodeFileSystem.move', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('refuses to overwrite an existing destination', async () => {
    fs.writeFileSync(path.join(dir, 'src.pdf'), 'new');
    fs.writeFileSync(path.join(dir, 'dst.pdf'), 'old');

    await expect(nodeFileSystem.move(path.join(dir, 'src.pdf'), path.join(dir, 'dst.pdf'))).rejects.toMatchObject({
      code: 'FS_DESTINATION_EXISTS',
    });
    expect(fs.readFileSync(path.join(dir, 'dst.pdf'), 'utf8')).toBe('old');
  });

  it('reports a missing source as a failed move', async () => {
    await expect(nodeFileSystem.move(path.join(dir, 'gone.pdf'), path.join(dir, 'dst.pdf'))).rejects.toMatchObject({
      code: 'FS_MOVE_FAILED',
    });
  });
});
