import * as path from 'path';
import type { BatchReport, RecordStatus } from './types.js';

export interface BatchSummary {
  total: number;
  moved: number;
  previewed: number;
  skipped: number;
}

export function summarizeBatch(report: BatchReport): BatchSummary {
  const count = (status: RecordStatus) => report.records.filter(r => r.status === status).length;
  return {
    total: report.records.length,
    moved: count('moved'),
    previewed: count('previewed'),
    skipped: count('skipped'),
  };
}

const RULE = '-'.repeat(50);

/**
 * Printable end-of-run summary: what was (or would be) renamed, what was
 * skipped and why.
 */
export function formatSummary(report: BatchReport): string[] {
  const dryRun = report.mode === 'preview';
  const lines = [
    `Mode: ${dryRun ? 'DRY RUN' : 'EXECUTION'}`,
    `Input Directory: ${report.inputDir}`,
    `Output Directory: ${report.outputDir}`,
    RULE,
  ];

  if (report.records.length === 0) {
    lines.push('No PDF files found.');
    return lines;
  }

  for (const record of report.records) {
    const source = path.basename(record.sourcePath);
    if ((record.status === 'moved' || record.status === 'previewed') && record.targetPath) {
      lines.push(`✅ ${source} → ${path.basename(record.targetPath)}`);
    } else if (record.status === 'skipped') {
      const code = record.error ? `${record.error.code}: ` : '';
      lines.push(`⏭️  ${source} (${code}${record.skipReason ?? 'skipped'})`);
    }
  }

  const summary = summarizeBatch(report);
  const done = dryRun ? `${summary.previewed} to rename` : `${summary.moved} renamed`;
  lines.push(RULE);
  lines.push(`Summary: ${done}, ${summary.skipped} skipped, ${summary.total} total`);
  return lines;
}
