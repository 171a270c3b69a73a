import * as fs from 'fs';
import * as path from 'path';
import type { CoverExtractor } from '../extractors/coverExtractor.js';
import type { InferenceResult } from '../extractors/coverInferencer.js';
import {
  UniqueNameAllocator,
  formatFilename,
  isConventionalName,
} from '../triage/namingConvention.js';
import { createFileLogger, silentLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { FilesystemError, describeError, isStageError } from './errors.js';
import {
  advance,
  type BatchReport,
  type CoverContent,
  type DocumentRecord,
  type RunMode,
} from './types.js';

export interface MetadataInferencer {
  infer(cover: CoverContent, logger?: Logger): Promise<InferenceResult>;
}

export interface FileSystemOps {
  exists(filePath: string): boolean;
  move(sourcePath: string, targetPath: string): Promise<void>;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Moves never overwrite: an existing destination is an error, and the
 * cross-device fallback copies with COPYFILE_EXCL.
 */
export const nodeFileSystem: FileSystemOps = {
  exists: filePath => fs.existsSync(filePath),

  async move(sourcePath, targetPath) {
    if (fs.existsSync(targetPath)) {
      throw new FilesystemError('FS_DESTINATION_EXISTS', `Destination already exists: ${targetPath}`);
    }
    try {
      await fs.promises.rename(sourcePath, targetPath);
    } catch (error) {
      if (errnoCode(error) !== 'EXDEV') {
        throw new FilesystemError('FS_MOVE_FAILED', `Could not move ${path.basename(sourcePath)}: ${describeError(error)}`, { cause: error });
      }
      try {
        await fs.promises.copyFile(sourcePath, targetPath, fs.constants.COPYFILE_EXCL);
        await fs.promises.unlink(sourcePath);
      } catch (copyError) {
        const code = errnoCode(copyError) === 'EEXIST' ? 'FS_DESTINATION_EXISTS' : 'FS_MOVE_FAILED';
        throw new FilesystemError(code, `Could not move ${path.basename(sourcePath)} across devices: ${describeError(copyError)}`, { cause: copyError });
      }
    }
  },
};

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  mode: RunMode;
  requestDelayMs?: number;
  maxTitleLength?: number;
  /**
   * Leave files whose names already follow the convention alone.
   * Defaults to on only when input and output are the same folder.
   */
  skipConventionalNames?: boolean;
}

export interface BatchDependencies {
  extractor: CoverExtractor;
  inferencer: MetadataInferencer;
  fileSystem?: FileSystemOps;
  logger?: Logger;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Runs one batch: every PDF in the input folder goes
 * pending → extracted → inferred → formatted → previewed | moved,
 * or drops to skipped at whichever step fails. One file's failure
 * never stops the batch.
 */
export class BatchOrchestrator {
  private readonly fileSystem: FileSystemOps;
  private readonly logger: Logger;
  private readonly wait: (ms: number) => Promise<void>;
  private modelCalls = 0;

  constructor(
    private readonly options: BatchOptions,
    private readonly deps: BatchDependencies
  ) {
    this.fileSystem = deps.fileSystem ?? nodeFileSystem;
    this.logger = deps.logger ?? silentLogger;
    this.wait = deps.wait ?? sleep;
  }

  async listInputFiles(): Promise<string[]> {
    const entries = await fs.promises.readdir(this.options.inputDir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !entry.name.startsWith('.') && path.extname(entry.name).toLowerCase() === '.pdf')
      .map(entry => entry.name)
      .sort((a, b) => a.localeCompare(b))
      .map(name => path.join(this.options.inputDir, name));
  }

  async run(): Promise<BatchReport> {
    const startedAt = new Date();
    const allocator = new UniqueNameAllocator();
    const files = await this.listInputFiles();
    this.modelCalls = 0;

    this.logger.info(
      { mode: this.options.mode, inputDir: this.options.inputDir, outputDir: this.options.outputDir, files: files.length },
      files.length === 0 ? 'No PDF files found.' : `Found ${files.length} PDFs.`
    );

    const records: DocumentRecord[] = [];
    for (const sourcePath of files) {
      records.push(await this.processFile(sourcePath, allocator));
    }

    return {
      mode: this.options.mode,
      inputDir: this.options.inputDir,
      outputDir: this.options.outputDir,
      records,
      startedAt,
      finishedAt: new Date(),
    };
  }

  private async processFile(sourcePath: string, allocator: UniqueNameAllocator): Promise<DocumentRecord> {
    const record: DocumentRecord = { sourcePath, status: 'pending' };
    const log = createFileLogger(this.logger, path.basename(sourcePath));

    if (this.skipConventionalNames() && isConventionalName(path.basename(sourcePath))) {
      this.skip(record, log, 'already named');
      return record;
    }

    try {
      record.cover = await this.deps.extractor.extract(sourcePath);
      advance(record, 'extracted');

      await this.throttle();
      const result = await this.deps.inferencer.infer(record.cover, log);
      if (!result.ok) {
        throw result.error;
      }
      record.inferredFields = result.fields;
      advance(record, 'inferred');

      const filename = formatFilename(result.fields, { maxTitleLength: this.options.maxTitleLength });
      const targetName = allocator.allocate(filename, candidate =>
        this.fileSystem.exists(path.join(this.options.outputDir, candidate))
      );
      record.targetPath = path.join(this.options.outputDir, targetName);
      advance(record, 'formatted');

      if (this.options.mode === 'preview') {
        advance(record, 'previewed');
        log.info({ target: record.targetPath }, `[DRY RUN] Rename & Move: '${path.basename(sourcePath)}' -> '${targetName}'`);
        return record;
      }

      await this.fileSystem.move(sourcePath, record.targetPath);
      advance(record, 'moved');
      log.info({ target: record.targetPath }, `[SUCCESS] Moved to: ${targetName}`);
    } catch (error) {
      if (!isStageError(error)) {
        throw error;
      }
      record.error = error;
      this.skip(record, log, error.message);
    }
    return record;
  }

  // Already-named files only stay put when they already sit in the output folder
  private skipConventionalNames(): boolean {
    return this.options.skipConventionalNames ??
      path.resolve(this.options.inputDir) === path.resolve(this.options.outputDir);
  }

  private skip(record: DocumentRecord, log: Logger, reason: string): void {
    advance(record, 'skipped');
    record.skipReason = reason;
    log.warn({ code: record.error?.code, reason }, 'skipped');
  }

  // Politeness delay between model calls; the first call goes straight out
  private async throttle(): Promise<void> {
    const delay = this.options.requestDelayMs ?? 0;
    if (this.modelCalls > 0 && delay > 0) {
      await this.wait(delay);
    }
    this.modelCalls++;
  }
}
