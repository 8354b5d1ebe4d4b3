import { Type, type Static } from '@sinclair/typebox';

import { MEMORY_CATEGORIES } from '../config.js';
import type { MemoryDB } from './memory-db.js';
import type { MemoryRecord, MemoryView } from './types.js';

export const EXPORT_FORMAT = 'recollect-export';
export const EXPORT_VERSION = 1;

/** One record as it appears in an export document. */
export const exportedRecordSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  category: Type.String(),
  significance: Type.Number(),
  title: Type.String(),
  content: Type.String(),
  tags: Type.Array(Type.String()),
  project: Type.Union([Type.String(), Type.Null()]),
  source: Type.String(),
  createdAt: Type.Integer({ minimum: 0 }),
  lastAccessedAt: Type.Integer({ minimum: 0 }),
  recall: Type.Number(),
  lastDecayAt: Type.Integer({ minimum: 0 }),
});

export type ExportedRecord = Static<typeof exportedRecordSchema>;

/**
 * Envelope of an export document. Records are checked one at a time on
 * import, so a single bad entry does not reject the whole file.
 */
export const exportEnvelopeSchema = Type.Object({
  format: Type.Literal(EXPORT_FORMAT),
  version: Type.Literal(EXPORT_VERSION),
  exportedAt: Type.Integer(),
  records: Type.Array(Type.Unknown()),
});

export type ExportDocument = {
  format: typeof EXPORT_FORMAT;
  version: typeof EXPORT_VERSION;
  exportedAt: number;
  records: MemoryRecord[];
};

export function exportRecords(db: MemoryDB): ExportDocument {
  return {
    format: EXPORT_FORMAT,
    version: EXPORT_VERSION,
    exportedAt: Math.floor(Date.now() / 1000),
    records: db.records(),
  };
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortKeys(v)]),
    );
  }
  return value;
}

/** Stable textual form: sorted keys, two-space indent, trailing newline. */
export function serializeExport(doc: ExportDocument): string {
  return `${JSON.stringify(sortKeys(doc), null, 2)}\n`;
}

function formatDate(sec: number): string {
  return new Date(sec * 1000).toISOString().slice(0, 16).replace('T', ' ');
}

function renderTextEntry(view: MemoryView): string[] {
  const lines = [
    `[${view.id}] ${view.title}`,
    `  sig ${view.significance} | recall ${view.recall.toFixed(2)} | ${view.state} | created ${formatDate(view.createdAt)}`,
  ];
  if (view.project) lines.push(`  project: ${view.project}`);
  if (view.tags.length > 0) lines.push(`  tags: ${view.tags.join(', ')}`);
  for (const line of view.content.split('\n')) lines.push(`  ${line}`);
  return lines;
}

/** Plain-text dump of every record grouped by category, for piping elsewhere. */
export function exportText(db: MemoryDB): string {
  const views = db.list();
  const out: string[] = [];

  for (const category of MEMORY_CATEGORIES) {
    const entries = views.filter(v => v.category === category);
    if (entries.length === 0) continue;
    out.push(`=== ${category.toUpperCase()} (${entries.length}) ===`);
    for (const view of entries) {
      out.push(...renderTextEntry(view), '');
    }
  }

  if (out.length === 0) return 'No memories stored.\n';
  return `${out.join('\n').trimEnd()}\n`;
}
