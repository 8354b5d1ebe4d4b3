import { Value } from '@sinclair/typebox/value';
import Database from 'better-sqlite3';
import { closeSync, existsSync, openSync, readFileSync, readSync, statSync } from 'node:fs';
import { resolve } from 'node:path';

import { clampRecall, isDecayEligible } from './decay.js';
import {
  InvalidInputError,
  SchemaMismatchError,
  SourceNotFoundError,
  StoreUnavailableError,
} from './errors.js';
import { exportEnvelopeSchema, exportedRecordSchema } from './export.js';
import { silentLogger, type Logger } from './logger.js';
import type { MemoryDB } from './memory-db.js';
import { normalizeTags, validateCategory, validateSignificance } from './records.js';
import type { MemoryRecord } from './types.js';

const SQLITE_MAGIC = Buffer.from('SQLite format 3\0', 'latin1');

/** Columns a source `memories` table must have; the rest fall back to defaults. */
export const REQUIRED_COLUMNS = ['id', 'category', 'significance', 'title', 'content', 'created_at'];

export type MigrationReport = {
  imported: number;
  renamed: number;
  skipped: number;
  failed: { id: string; reason: string }[];
};

function isSqliteFile(path: string): boolean {
  const fd = openSync(path, 'r');
  try {
    const header = Buffer.alloc(SQLITE_MAGIC.length);
    const read = readSync(fd, header, 0, header.length, 0);
    return read === header.length && header.equals(SQLITE_MAGIC);
  } finally {
    closeSync(fd);
  }
}

function parseTagColumn(raw: unknown): unknown {
  if (raw === null || raw === undefined || raw === '') return [];
  if (typeof raw !== 'string') return raw;
  if (raw.trimStart().startsWith('[')) {
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
  return raw.split(',');
}

/** Older stores keep ISO-8601 strings; everything here is epoch seconds. */
function toEpochSeconds(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  const ms = Date.parse(raw);
  return Number.isFinite(ms) ? Math.floor(ms / 1000) : raw;
}

/**
 * Read the `memories` table of another store, read-only. Optional columns
 * missing from older layouts take the values a fresh record would have.
 */
function readSqliteSource(path: string): unknown[] {
  let source: Database.Database;
  try {
    source = new Database(path, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new SchemaMismatchError(path, `cannot open as SQLite: ${String(err)}`);
  }

  try {
    const columns = new Set(
      source
        .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('memories')`)
        .all()
        .map(c => c.name),
    );
    if (columns.size === 0) throw new SchemaMismatchError(path, 'no memories table');
    const missing = REQUIRED_COLUMNS.filter(c => !columns.has(c));
    if (missing.length > 0) {
      throw new SchemaMismatchError(path, `memories table lacks column(s): ${missing.join(', ')}`);
    }

    const rows = source.prepare<[], Record<string, unknown>>(`SELECT * FROM memories`).all();
    const nowSec = Math.floor(Date.now() / 1000);
    return rows.map(row => {
      // older layouts: recall_strength (decayed in place by their own passes) and last_accessed
      const recall = row.recall ?? row.recall_strength ?? 1;
      const lastAccessed = row.last_accessed_at ?? row.last_accessed ?? row.created_at;
      const decayedInPlace = row.recall_strength !== undefined && row.recall_strength !== null;
      return {
        id: typeof row.id === 'number' ? String(row.id) : row.id,
        category: row.category,
        significance: row.significance,
        title: row.title,
        content: row.content,
        tags: parseTagColumn(row.tags),
        project: row.project ?? null,
        source: row.source ?? `import:${path}`,
        createdAt: toEpochSeconds(row.created_at),
        lastAccessedAt: toEpochSeconds(lastAccessed),
        recall: typeof recall === 'number' ? clampRecall(recall) : recall,
        lastDecayAt: toEpochSeconds(row.last_decay_at ?? (decayedInPlace ? nowSec : lastAccessed)),
      };
    });
  } catch (err) {
    if (err instanceof SchemaMismatchError) throw err;
    throw new SchemaMismatchError(path, String(err));
  } finally {
    source.close();
  }
}

function readJsonSource(path: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new SchemaMismatchError(path, 'neither a SQLite database nor a JSON export');
  }
  if (!Value.Check(exportEnvelopeSchema, parsed)) {
    const first = [...Value.Errors(exportEnvelopeSchema, parsed)][0];
    const where = first ? `${first.path || '/'}: ${first.message}` : 'unexpected shape';
    throw new SchemaMismatchError(path, `not a recollect export (${where})`);
  }
  return parsed.records;
}

function candidateId(candidate: unknown): string {
  if (candidate !== null && typeof candidate === 'object' && 'id' in candidate) {
    return String(candidate.id);
  }
  return '<unknown>';
}

/** Validate one source record the way `add` validates new input. */
export function toImportRecord(candidate: unknown): MemoryRecord {
  if (!Value.Check(exportedRecordSchema, candidate)) {
    const first = [...Value.Errors(exportedRecordSchema, candidate)][0];
    throw new InvalidInputError(first ? `${first.path}: ${first.message}` : 'malformed record');
  }
  const category = validateCategory(candidate.category);
  const significance = validateSignificance(candidate.significance);
  const title = candidate.title.trim();
  const content = candidate.content.trim();
  if (!title || !content) throw new InvalidInputError('title and content must not be empty');
  if (candidate.recall < 0 || candidate.recall > 1) {
    throw new InvalidInputError(`recall out of range: ${candidate.recall}`);
  }

  return {
    id: candidate.id,
    category,
    significance,
    title,
    content,
    tags: normalizeTags(candidate.tags),
    project: candidate.project?.trim() || null,
    source: candidate.source.trim() || 'import',
    createdAt: candidate.createdAt,
    lastAccessedAt: candidate.lastAccessedAt,
    recall: isDecayEligible(category) ? candidate.recall : 1,
    lastDecayAt: candidate.lastDecayAt,
  };
}

/**
 * Merge another store into `db`, one record per transaction. The source may
 * be a recollect SQLite database or a JSON export; it is only ever read.
 * Running the same migration again imports nothing new.
 */
export function migrate(
  db: MemoryDB,
  sourcePath: string,
  logger: Logger = silentLogger,
): MigrationReport {
  const path = resolve(sourcePath);
  if (!existsSync(path) || !statSync(path).isFile()) throw new SourceNotFoundError(sourcePath);
  if (path === resolve(db.dbPath)) {
    throw new InvalidInputError('cannot migrate a store into itself');
  }

  const candidates = isSqliteFile(path) ? readSqliteSource(path) : readJsonSource(path);
  const report: MigrationReport = { imported: 0, renamed: 0, skipped: 0, failed: [] };

  for (const candidate of candidates) {
    const id = candidateId(candidate);
    try {
      const result = db.importRecord(toImportRecord(candidate));
      switch (result.outcome) {
        case 'imported':
          report.imported++;
          break;
        case 'renamed':
          report.renamed++;
          logger.warn(`memory ${id} differs from the stored copy, imported as ${result.id}`);
          break;
        case 'skipped':
          report.skipped++;
          break;
      }
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      report.failed.push({ id, reason });
      logger.warn(`skipped memory ${id}: ${reason}`);
    }
  }

  logger.info(
    `migrated ${path}: ${report.imported} imported, ${report.renamed} renamed, ${report.skipped} unchanged, ${report.failed.length} failed`,
  );
  return report;
}
