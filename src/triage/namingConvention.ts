import { FormatError } from "../renamer/errors.js";
import type { InferredFields } from "../renamer/types.js";

/**
 * Standardizes filenames for research reports:
 * {industry}-{region}-{title}-{institution}-{date}.pdf
 */

export const DEFAULT_MAX_TITLE_LENGTH = 40;
export const MAX_COLLISION_SUFFIX = 99;

// Characters Windows refuses in filenames, plus ASCII control characters
const ILLEGAL_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;

const CONVENTIONAL_NAME = /^[^-]+-(WW|CN)-.+-[^-]+-\d{6}(_\d+)?\.pdf$/i;

export function sanitizeComponent(value: string): string {
  return value
    .replace(ILLEGAL_CHARS, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[.\s]+$/, "");
}

// The template splits on "-", so only the title may keep hyphens
export function sanitizeFieldComponent(value: string): string {
  return sanitizeComponent(value.replace(/-+/g, " "));
}

/**
 * Truncate by code point so CJK text and emoji are never split mid-character
 */
export function truncateTitle(title: string, maxLength: number): string {
  const codePoints = Array.from(title);
  if (codePoints.length <= maxLength) return title;
  return codePoints.slice(0, maxLength).join("").trim();
}

export interface FormatOptions {
  maxTitleLength?: number;
}

export function formatFilename(fields: InferredFields, options: FormatOptions = {}): string {
  const maxTitleLength = options.maxTitleLength ?? DEFAULT_MAX_TITLE_LENGTH;
  const components: Array<[keyof InferredFields, string]> = [
    ["industry", sanitizeFieldComponent(fields.industry)],
    ["region", sanitizeFieldComponent(fields.region)],
    ["title", sanitizeComponent(truncateTitle(sanitizeComponent(fields.title), maxTitleLength))],
    ["institution", sanitizeFieldComponent(fields.institution)],
    ["date", sanitizeFieldComponent(fields.date)],
  ];

  const empty = components.filter(([, value]) => value === "").map(([key]) => key);
  if (empty.length > 0) {
    throw new FormatError("FORMAT_EMPTY_COMPONENT", `Empty filename component after sanitizing: ${empty.join(", ")}`);
  }

  return `${components.map(([, value]) => value).join("-")}.pdf`;
}

export function isConventionalName(filename: string): boolean {
  return CONVENTIONAL_NAME.test(filename);
}

function splitExtension(filename: string): [string, string] {
  const dot = filename.lastIndexOf(".");
  return dot > 0 ? [filename.slice(0, dot), filename.slice(dot)] : [filename, ""];
}

/**
 * Hands out target names for one batch. A name is taken if it was handed
 * out earlier in the batch or if `isTaken` says so (e.g. it already exists
 * in the output folder). Comparison is case-insensitive, since macOS and
 * Windows volumes are.
 */
export class UniqueNameAllocator {
  private readonly reserved = new Set<string>();

  constructor(private readonly maxSuffix: number = MAX_COLLISION_SUFFIX) {}

  allocate(filename: string, isTaken: (candidate: string) => boolean = () => false): string {
    const [stem, ext] = splitExtension(filename);
    for (let n = 0; n <= this.maxSuffix; n++) {
      const candidate = n === 0 ? filename : `${stem}_${n}${ext}`;
      if (!this.reserved.has(candidate.toLowerCase()) && !isTaken(candidate)) {
        this.reserved.add(candidate.toLowerCase());
        return candidate;
      }
    }
    throw new FormatError(
      "FORMAT_COLLISION_UNRESOLVED",
      `No free name for ${filename} after ${this.maxSuffix} numbered variants`
    );
  }

  get size(): number {
    return this.reserved.size;
  }
}
