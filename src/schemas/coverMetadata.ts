/**
 * Cover-page metadata: the schema Gemini answers in, and the zod schema
 * the answer is validated against before anything is renamed.
 */
import { SchemaType, type Schema } from '@google/generative-ai';
import { z } from 'zod';
import type { InferredFields, Region } from '../renamer/types.js';

export const CoverMetadataResponseSchema: Schema = {
  type: SchemaType.OBJECT,
  description: "Metadata read from a research report cover page",
  properties: {
    industry: { type: SchemaType.STRING, description: "Main industry application, short (e.g. AI, ADAS, Semi, DRAM, Auto, EV)" },
    region: { type: SchemaType.STRING, description: "WW for worldwide/global coverage, CN for China", nullable: true },
    title: { type: SchemaType.STRING, description: "Concise, impactful report title in Traditional Chinese, not URL-encoded" },
    institution: { type: SchemaType.STRING, description: "Research institution or bank abbreviation (e.g. MS, GS, CICC)" },
    date: { type: SchemaType.STRING, description: "Report date in YYMMDD format (e.g. 220625)" }
  },
  required: ["industry", "title", "institution", "date"]
};

export const REQUIRED_FIELDS = ['industry', 'title', 'institution', 'date'] as const;
export type RequiredField = typeof REQUIRED_FIELDS[number];

// Models sometimes answer numbers for dates or "null" for unknowns
const looseText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform(value => {
    if (value === null || value === undefined) return '';
    const text = String(value).trim();
    return text.toLowerCase() === 'null' || text.toLowerCase() === 'n/a' ? '' : text;
  });

export const RawCoverMetadataSchema = z.object({
  industry: looseText,
  region: looseText,
  title: looseText,
  institution: looseText,
  date: looseText,
});

export type RawCoverMetadata = z.infer<typeof RawCoverMetadataSchema>;

const REGION_ALIASES: Record<string, Region> = {
  'WW': 'WW',
  'GLOBAL': 'WW',
  'WORLDWIDE': 'WW',
  'WORLD': 'WW',
  'GL': 'WW',
  '全球': 'WW',
  'CN': 'CN',
  'CHINA': 'CN',
  'PRC': 'CN',
  '中國': 'CN',
  '中国': 'CN',
};

/**
 * Map a model's region answer onto WW/CN. Blank falls back to WW.
 */
export function normalizeRegion(value: string): Region | null {
  const key = value.trim().toUpperCase();
  if (key === '') return 'WW';
  return REGION_ALIASES[key] ?? null;
}

const SEPARATED_DATE = /^(\d{2}|\d{4})[-./](\d{1,2})[-./](\d{1,2})$/;

/**
 * Normalise a report date to YYMMDD.
 * Accepts YYMMDD, YYYYMMDD and separated YY(YY)-M-D forms.
 */
export function normalizeReportDate(value: string): string | null {
  const trimmed = value.trim();
  let yy: string;
  let mm: string;
  let dd: string;

  const separated = SEPARATED_DATE.exec(trimmed);
  if (separated) {
    yy = separated[1].slice(-2);
    mm = separated[2].padStart(2, '0');
    dd = separated[3].padStart(2, '0');
  } else if (/^\d{6}$/.test(trimmed)) {
    [yy, mm, dd] = [trimmed.slice(0, 2), trimmed.slice(2, 4), trimmed.slice(4, 6)];
  } else if (/^\d{8}$/.test(trimmed)) {
    [yy, mm, dd] = [trimmed.slice(2, 4), trimmed.slice(4, 6), trimmed.slice(6, 8)];
  } else {
    return null;
  }

  const month = Number(mm);
  const day = Number(dd);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return `${yy}${mm}${dd}`;
}

export function missingRequiredFields(raw: RawCoverMetadata): RequiredField[] {
  return REQUIRED_FIELDS.filter(field => raw[field] === '');
}

export const CoverFieldsSchema = RawCoverMetadataSchema.transform((raw, ctx): InferredFields => {
  const region = normalizeRegion(raw.region);
  if (region === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['region'], message: `unknown region "${raw.region}"` });
  }
  const date = normalizeReportDate(raw.date);
  if (date === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['date'], message: `date "${raw.date}" is not YYMMDD` });
  }
  if (region === null || date === null) return z.NEVER;

  return Object.freeze({
    industry: raw.industry,
    region,
    title: raw.title,
    institution: raw.institution,
    date,
  });
});
