import { z } from 'zod';

export const DEFAULT_SOURCE_EXTENSION = '.st';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts a JSON object and passes the caller's object through unchanged.
 * `z.record` rebuilds its output and would drop an own `"__proto__"` key.
 */
export function plainObjectSchema(message: string) {
  return z.custom<Record<string, unknown>>(isPlainObject, message);
}

const sourcesSchema = z
  .custom<Record<string, string>>(isPlainObject, 'payload.sources must be object')
  .superRefine((sources, ctx) => {
    if (!isPlainObject(sources)) {
      return;
    }
    for (const [path, text] of Object.entries<unknown>(sources)) {
      if (path.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'payload.sources keys must be non-empty strings',
          path: [path],
        });
      }
      if (typeof text !== 'string') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'payload.sources values must be strings',
          path: [path],
        });
      }
    }
  });

export const projectBundlePayloadSchema = z.object({
  project: plainObjectSchema('payload.project must be object'),
  pages: plainObjectSchema('payload.pages must be object'),
  vars: plainObjectSchema('payload.vars must be object'),
  sources: sourcesSchema,
  meta: z.unknown().transform((value): Record<string, unknown> => (isPlainObject(value) ? value : {})),
});

export type ProjectBundlePayload = z.infer<typeof projectBundlePayloadSchema>;

export interface ProjectBundle extends ProjectBundlePayload {
  received_utc: string;
}

export interface ProjectSummary {
  name: string;
  pages: number;
  sheets: number;
  files: number;
  st_files: number;
  bytes: number;
  received_utc: string;
}

interface SummarizeOptions {
  sourceExtension?: string;
  receivedUtc: string;
}

function asObject(value: unknown): Record<string, unknown> | null {
  return isPlainObject(value) ? value : null;
}

function arrayLength(value: unknown): number {
  return Array.isArray(value) ? value.length : 0;
}

function countPagesAndSheets(pages: Record<string, unknown>): { pages: number; sheets: number } {
  let pageCount = 0;
  let sheetCount = 0;

  const init = asObject(pages['init']);
  if (init !== null) {
    pageCount += 1;
    sheetCount += arrayLength(init['sheets']);
  }

  const pageList = pages['pages'];
  if (Array.isArray(pageList)) {
    pageCount += pageList.length;
    for (const page of pageList) {
      const record = asObject(page);
      if (record !== null) {
        sheetCount += arrayLength(record['sheets']);
      }
    }
  }

  return {
    pages: pageCount,
    sheets: sheetCount,
  };
}

export function formatUtcSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function summarizeProjectBundle(
  payload: ProjectBundlePayload,
  options: SummarizeOptions,
): ProjectSummary {
  const extension = (options.sourceExtension ?? DEFAULT_SOURCE_EXTENSION).toLowerCase();
  let bytes = 0;
  let sourceFiles = 0;
  const entries = Object.entries(payload.sources);
  for (const [path, text] of entries) {
    bytes += Buffer.byteLength(text, 'utf8');
    if (path.toLowerCase().endsWith(extension)) {
      sourceFiles += 1;
    }
  }

  const name = payload.project['name'];
  const counts = countPagesAndSheets(payload.pages);
  return {
    name: name === undefined || name === null ? '' : String(name),
    pages: counts.pages,
    sheets: counts.sheets,
    files: entries.length,
    st_files: sourceFiles,
    bytes,
    received_utc: options.receivedUtc,
  };
}
