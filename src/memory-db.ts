import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { MemoryCategory, MemoryState } from '../config.js';
import { applyDecay, boostRecall, classifyState, isDecayEligible } from './decay.js';
import { InvalidInputError, NotFoundError, StoreUnavailableError, isLockError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  rowToRecord,
  sameContent,
  validateNewMemory,
  validatePatch,
  type MemoryRow,
} from './records.js';
import {
  buildMatchQuery,
  compareResults,
  normalizeRanks,
  phraseTier,
  relevanceScore,
} from './search.js';
import type {
  DecayReport,
  MemoryPatch,
  MemoryRecord,
  MemoryView,
  NewMemory,
  PruneReport,
  SavedSession,
  SearchResult,
  StoreStats,
} from './types.js';

const SCHEMA_VERSION = '1';
const DEFAULT_SEARCH_LIMIT = 20;
const DEFAULT_SESSION_CAP_BYTES = 200 * 1024 * 1024;
const MAX_IMPORT_SUFFIX = 1000;

type SessionRow = {
  id: number;
  summary: string;
  project: string;
  files_changed: string;
  created_at: number;
  size_bytes: number;
};

export type MemoryDBOptions = {
  logger?: Logger;
  busyTimeoutMs?: number;
  sessionStorageCapBytes?: number;
};

export type ImportOutcome = {
  outcome: 'imported' | 'renamed' | 'skipped';
  id: string;
};

export function toView(record: MemoryRecord, nowSec: number): MemoryView {
  const { recall, lastDecayAt } = applyDecay(record, nowSec);
  return {
    ...record,
    recall,
    lastDecayAt,
    state: classifyState(recall, record.significance),
  };
}

function emptyStateCounts(): Record<MemoryState, number> {
  return { clear: 0, fuzzy: 0, blank: 0 };
}

export class MemoryDB {
  private db: Database.Database;
  private readonly logger: Logger;
  private readonly sessionCapBytes: number;

  constructor(
    readonly dbPath: string,
    options: MemoryDBOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sessionCapBytes = options.sessionStorageCapBytes ?? DEFAULT_SESSION_CAP_BYTES;

    try {
      mkdirSync(dirname(dbPath), { recursive: true });
      this.db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });
      // WAL lets readers proceed while another process holds the write lock
      this.db.pragma('journal_mode = WAL');
      this.createSchema();
    } catch (err) {
      throw new StoreUnavailableError(
        `cannot open memory store at ${dbPath}: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
    this.logger.debug(`opened store ${dbPath}`);
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id TEXT PRIMARY KEY,
        category TEXT NOT NULL
          CHECK (category IN ('knowledge', 'current_state', 'decision', 'session')),
        significance INTEGER NOT NULL CHECK (significance BETWEEN 1 AND 10),
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '[]',
        project TEXT,
        source TEXT NOT NULL DEFAULT 'manual',
        created_at INTEGER NOT NULL,
        last_accessed_at INTEGER NOT NULL,
        recall REAL NOT NULL DEFAULT 1.0 CHECK (recall >= 0.0 AND recall <= 1.0),
        last_decay_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_memories_category ON memories(category);
      CREATE INDEX IF NOT EXISTS idx_memories_project ON memories(project);
      CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at);

      CREATE TABLE IF NOT EXISTS sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        summary TEXT NOT NULL,
        project TEXT NOT NULL DEFAULT '',
        files_changed TEXT NOT NULL DEFAULT '[]',
        created_at INTEGER NOT NULL,
        size_bytes INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS _meta (key TEXT PRIMARY KEY, value TEXT);
    `);

    // Full-text index over title, content and tags (porter stemming for reformulation)
    this.db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS memories_fts USING fts5(
        title,
        content,
        tags,
        content=memories,
        content_rowid=rowid,
        tokenize='porter unicode61 remove_diacritics 2'
      );

      CREATE TRIGGER IF NOT EXISTS memories_ai AFTER INSERT ON memories BEGIN
        INSERT INTO memories_fts(rowid, title, content, tags)
        VALUES (new.rowid, new.title, new.content, new.tags);
      END;

      CREATE TRIGGER IF NOT EXISTS memories_ad AFTER DELETE ON memories BEGIN
        INSERT INTO memories_fts(memories_fts, rowid, title, content, tags)
        VALUES ('delete', old.rowid, old.title, old.content, old.tags);
      END;

      CREATE TRIGGER IF NOT EXISTS memories_au AFTER UPDATE OF title, content, tags ON memories BEGIN
        INSERT INTO memories_fts(memories_fts, rowid, title, content, tags)
        VALUES ('delete', old.rowid, old.title, old.content, old.tags);
        INSERT INTO memories_fts(rowid, title, content, tags)
        VALUES (new.rowid, new.title, new.content, new.tags);
      END;
    `);

    this.db
      .prepare(`INSERT OR IGNORE INTO _meta (key, value) VALUES ('schema_version', ?)`)
      .run(SCHEMA_VERSION);
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isLockError(err)) {
        throw new StoreUnavailableError(
          `memory store ${this.dbPath} is locked: ${err instanceof Error ? err.message : String(err)}`,
          err,
        );
      }
      throw err;
    }
  }

  /** Read-modify-write under SQLite's write lock (BEGIN IMMEDIATE). */
  private write<T>(fn: () => T): T {
    return this.guard(() => this.db.transaction(fn).immediate());
  }

  private findRow(id: string): MemoryRow | undefined {
    return this.db
      .prepare<[string], MemoryRow>(`SELECT * FROM memories WHERE id = ?`)
      .get(id);
  }

  private allRows(): MemoryRow[] {
    return this.db
      .prepare<[], MemoryRow>(`SELECT * FROM memories ORDER BY created_at, id`)
      .all();
  }

  private getMeta(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string | null }>(`SELECT value FROM _meta WHERE key = ?`)
      .get(key);
    return row?.value ?? null;
  }

  private setMeta(key: string, value: string): void {
    this.db
      .prepare(`INSERT OR REPLACE INTO _meta (key, value) VALUES (?, ?)`)
      .run(key, value);
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  add(input: NewMemory): MemoryView {
    const memory = validateNewMemory(input);
    const nowSec = Math.floor(Date.now() / 1000);
    const record: MemoryRecord = {
      id: randomUUID(),
      ...memory,
      createdAt: nowSec,
      lastAccessedAt: nowSec,
      recall: 1.0,
      lastDecayAt: nowSec,
    };

    this.write(() => this.insertRecord(record));
    this.logger.debug(`added ${record.category} memory ${record.id} (sig ${record.significance})`);
    return toView(record, nowSec);
  }

  private insertRecord(record: MemoryRecord): void {
    this.db
      .prepare(
        `INSERT INTO memories (id, category, significance, title, content, tags, project, source,
           created_at, last_accessed_at, recall, last_decay_at)
         VALUES (@id, @category, @significance, @title, @content, @tags, @project, @source,
           @createdAt, @lastAccessedAt, @recall, @lastDecayAt)`,
      )
      .run({ ...record, tags: JSON.stringify(record.tags) });
  }

  /** Current view of one record, decay computed but not persisted. */
  get(id: string): MemoryView {
    const row = this.guard(() => this.findRow(id));
    if (!row) throw new NotFoundError(id);
    return toView(rowToRecord(row), Math.floor(Date.now() / 1000));
  }

  /** Row to record, or null (with a warning) when the row cannot be read. */
  private readRow(row: MemoryRow): MemoryRecord | null {
    try {
      return rowToRecord(row);
    } catch (err) {
      this.logger.warn(`skipping unreadable memory ${row.id}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  /** Persisted records exactly as stored, oldest first. Unreadable rows are skipped. */
  records(): MemoryRecord[] {
    const records: MemoryRecord[] = [];
    for (const row of this.guard(() => this.allRows())) {
      const record = this.readRow(row);
      if (record) records.push(record);
    }
    return records;
  }

  list(
    filter: { category?: MemoryCategory; state?: MemoryState; project?: string | null } = {},
  ): MemoryView[] {
    const nowSec = Math.floor(Date.now() / 1000);
    return this.records()
      .map(r => toView(r, nowSec))
      .filter(v => filter.category === undefined || v.category === filter.category)
      .filter(v => filter.state === undefined || v.state === filter.state)
      .filter(v => filter.project === undefined || v.project === filter.project);
  }

  /**
   * Explicit update ("touch"). Decay owed under the old significance is
   * settled first so a new significance only affects weeks still to come.
   */
  update(id: string, patch: MemoryPatch): MemoryView {
    const changes = validatePatch(patch);
    const nowSec = Math.floor(Date.now() / 1000);

    const updated = this.write(() => {
      const row = this.findRow(id);
      if (!row) throw new NotFoundError(id);
      const current = rowToRecord(row);
      const settled = applyDecay(current, nowSec);
      const next: MemoryRecord = {
        ...current,
        ...changes,
        recall: settled.recall,
        lastDecayAt: settled.lastDecayAt,
      };
      this.db
        .prepare(
          `UPDATE memories SET significance = @significance, title = @title, content = @content,
             tags = @tags, recall = @recall, last_decay_at = @lastDecayAt
           WHERE id = @id`,
        )
        .run({
          id,
          significance: next.significance,
          title: next.title,
          content: next.content,
          tags: JSON.stringify(next.tags),
          recall: next.recall,
          lastDecayAt: next.lastDecayAt,
        });
      return next;
    });

    return toView(updated, nowSec);
  }

  delete(id: string): void {
    const changes = this.write(
      () => this.db.prepare(`DELETE FROM memories WHERE id = ?`).run(id).changes,
    );
    if (changes === 0) throw new NotFoundError(id);
  }

  count(): number {
    const row = this.guard(() =>
      this.db.prepare<[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM memories`).get(),
    );
    return row?.cnt ?? 0;
  }

  // ==========================================================================
  // Search & boost
  // ==========================================================================

  /**
   * Full-text search over title, content and tags. Every returned record is
   * boosted once: pending decay is settled, then recall rises by the boost
   * and last_accessed_at moves to now.
   */
  search(query: string, limit = DEFAULT_SEARCH_LIMIT): SearchResult[] {
    if (!query.trim()) throw new InvalidInputError('search query must not be empty');
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidInputError(`search limit must be a positive integer, got ${limit}`);
    }

    const match = buildMatchQuery(query);
    if (!match) return [];

    const rankNow = Math.floor(Date.now() / 1000);
    const rows = this.guard(() =>
      this.db
        .prepare<{ query: string }, MemoryRow & { rank: number }>(
          `SELECT m.*, fts.rank AS rank
           FROM memories m
           JOIN memories_fts fts ON m.rowid = fts.rowid
           WHERE memories_fts MATCH @query`,
        )
        .all({ query: match }),
    );
    if (rows.length === 0) return [];

    const bm25 = normalizeRanks(rows.map(r => r.rank));
    const seen = new Set<string>();
    const ranked: SearchResult[] = [];
    rows.forEach((row, i) => {
      if (seen.has(row.id)) return;
      seen.add(row.id);
      const stored = this.readRow(row);
      if (!stored) return;
      const record = toView(stored, rankNow);
      ranked.push({ record, score: relevanceScore(phraseTier(record, query), bm25[i] ?? 0) });
    });
    ranked.sort(compareResults);
    const top = ranked.slice(0, limit);

    return this.boost(top);
  }

  private boost(results: SearchResult[]): SearchResult[] {
    const nowSec = Math.floor(Date.now() / 1000);
    const update = this.db.prepare(
      `UPDATE memories SET recall = @recall, last_decay_at = @lastDecayAt, last_accessed_at = @now
       WHERE id = @id`,
    );

    return this.write(() => {
      const boosted: SearchResult[] = [];
      for (const result of results) {
        // re-read inside the lock so a concurrent writer's recall is not lost
        const row = this.findRow(result.record.id);
        const record = row ? this.readRow(row) : null;
        if (!record) continue;
        const settled = applyDecay(record, nowSec);
        const recall = boostRecall(settled.recall);
        update.run({ id: record.id, recall, lastDecayAt: settled.lastDecayAt, now: nowSec });
        boosted.push({
          record: toView({ ...record, recall, lastDecayAt: settled.lastDecayAt, lastAccessedAt: nowSec }, nowSec),
          score: result.score,
        });
      }
      return boosted;
    });
  }

  // ==========================================================================
  // Decay & prune
  // ==========================================================================

  /**
   * Persist decay for every record, one transaction per record so a bad row
   * cannot block maintenance of the rest.
   */
  decay(): DecayReport {
    const nowSec = Math.floor(Date.now() / 1000);
    const report: DecayReport = { updated: 0, failed: 0, clear: 0, fuzzy: 0, blank: 0 };
    const ids = this.guard(() =>
      this.db.prepare<[], { id: string }>(`SELECT id FROM memories ORDER BY created_at, id`).all(),
    );
    const update = this.db.prepare(
      `UPDATE memories SET recall = @recall, last_decay_at = @lastDecayAt WHERE id = @id`,
    );

    for (const { id } of ids) {
      try {
        const result = this.write(() => {
          const row = this.findRow(id);
          if (!row) return null;
          const record = rowToRecord(row);
          const settled = applyDecay(record, nowSec);
          const changed =
            settled.recall !== row.recall || settled.lastDecayAt !== row.last_decay_at;
          if (changed) {
            update.run({ id, recall: settled.recall, lastDecayAt: settled.lastDecayAt });
          }
          return { changed, state: classifyState(settled.recall, record.significance) };
        });
        if (!result) continue;
        if (result.changed) report.updated++;
        report[result.state]++;
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        report.failed++;
        this.logger.warn(`decay failed for memory ${id}: ${String(err)}`);
      }
    }

    this.write(() => this.setMeta('last_decay_run', String(nowSec)));
    this.logger.info(
      `decay pass: ${report.updated} updated (${report.clear} clear, ${report.fuzzy} fuzzy, ${report.blank} blank)`,
    );
    return report;
  }

  /** Ids a prune would remove right now, without touching the store. */
  pruneCandidates(): string[] {
    return this.list()
      .filter(v => isDecayEligible(v.category) && v.state === 'blank')
      .map(v => v.id);
  }

  /**
   * Run a decay pass, then delete every decay-eligible record that is Blank.
   * knowledge and current_state records are never removed. Each record is
   * checked and deleted in its own transaction.
   */
  prune(): PruneReport {
    this.decay();
    const nowSec = Math.floor(Date.now() / 1000);
    const report: PruneReport = { count: 0, ids: [], failed: 0 };
    const ids = this.guard(() =>
      this.db.prepare<[], { id: string }>(`SELECT id FROM memories ORDER BY created_at, id`).all(),
    );
    const remove = this.db.prepare(`DELETE FROM memories WHERE id = ?`);

    for (const { id } of ids) {
      try {
        const removed = this.write(() => {
          const row = this.findRow(id);
          if (!row) return false;
          const view = toView(rowToRecord(row), nowSec);
          if (!isDecayEligible(view.category) || view.state !== 'blank') return false;
          return remove.run(id).changes > 0;
        });
        if (removed) {
          report.count++;
          report.ids.push(id);
        }
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        report.failed++;
        this.logger.warn(`prune failed for memory ${id}: ${String(err)}`);
      }
    }

    if (report.count > 0) this.logger.info(`pruned ${report.count} forgotten memories`);
    return report;
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  stats(): StoreStats {
    const views = this.list();
    const byCategory: Record<MemoryCategory, number> = {
      knowledge: 0,
      current_state: 0,
      decision: 0,
      session: 0,
    };
    const byCategoryState: Record<MemoryCategory, Record<MemoryState, number>> = {
      knowledge: emptyStateCounts(),
      current_state: emptyStateCounts(),
      decision: emptyStateCounts(),
      session: emptyStateCounts(),
    };
    const byState = emptyStateCounts();

    let recallSum = 0;
    for (const v of views) {
      byCategory[v.category]++;
      byState[v.state]++;
      byCategoryState[v.category][v.state]++;
      recallSum += v.recall;
    }

    const lastRun = this.guard(() => this.getMeta('last_decay_run'));
    return {
      total: views.length,
      byCategory,
      byState,
      byCategoryState,
      averageRecall: views.length > 0 ? recallSum / views.length : 0,
      lastDecayRun: lastRun === null ? null : Number(lastRun),
      sessions: this.countSessions(),
    };
  }

  // ==========================================================================
  // Import
  // ==========================================================================

  /**
   * Merge one record from another store. Same id and same content is a
   * no-op; same id with different content is kept alongside as `<id>~<n>`.
   */
  importRecord(record: MemoryRecord): ImportOutcome {
    return this.write(() => {
      for (let n = 0; n <= MAX_IMPORT_SUFFIX; n++) {
        const candidateId = n === 0 ? record.id : `${record.id}~${n}`;
        const existing = this.findRow(candidateId);
        if (!existing) {
          this.insertRecord({ ...record, id: candidateId });
          return { outcome: n === 0 ? 'imported' : 'renamed', id: candidateId };
        }
        if (sameContent(rowToRecord(existing), record)) {
          return { outcome: 'skipped', id: candidateId };
        }
      }
      throw new Error(`too many conflicting copies of memory ${record.id}`);
    });
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  saveSession(
    summary: string,
    options: { project?: string; filesChanged?: string[] } = {},
  ): number {
    const text = summary.trim();
    if (!text) throw new InvalidInputError('session summary must not be empty');
    const files = (options.filesChanged ?? []).map(f => f.trim()).filter(Boolean);
    const filesJson = JSON.stringify(files);
    const sizeBytes = Buffer.byteLength(text) + Buffer.byteLength(filesJson);
    const nowSec = Math.floor(Date.now() / 1000);

    return this.write(() => {
      const id = Number(
        this.db
          .prepare(
            `INSERT INTO sessions (summary, project, files_changed, created_at, size_bytes)
             VALUES (?, ?, ?, ?, ?)`,
          )
          .run(text, options.project?.trim() ?? '', filesJson, nowSec, sizeBytes).lastInsertRowid,
      );
      this.enforceSessionCap(id);
      return id;
    });
  }

  private enforceSessionCap(keepId: number): void {
    const total = (): number =>
      this.db
        .prepare<[], { total: number | null }>(`SELECT SUM(size_bytes) AS total FROM sessions`)
        .get()?.total ?? 0;
    const oldest = this.db.prepare<[number], { id: number }>(
      `SELECT id FROM sessions WHERE id != ? ORDER BY created_at, id LIMIT 1`,
    );
    const remove = this.db.prepare(`DELETE FROM sessions WHERE id = ?`);

    let removed = 0;
    while (total() > this.sessionCapBytes) {
      const victim = oldest.get(keepId);
      if (!victim) break;
      remove.run(victim.id);
      removed++;
    }
    if (removed > 0) this.logger.debug(`session cap reached, removed ${removed} oldest sessions`);
  }

  getSessions(limit = 50, project?: string): SavedSession[] {
    const rows = this.guard(() =>
      project === undefined
        ? this.db
            .prepare<[number], SessionRow>(
              `SELECT * FROM sessions ORDER BY created_at DESC, id DESC LIMIT ?`,
            )
            .all(limit)
        : this.db
            .prepare<[string, number], SessionRow>(
              `SELECT * FROM sessions WHERE project = ? ORDER BY created_at DESC, id DESC LIMIT ?`,
            )
            .all(project, limit),
    );
    return rows.map(row => {
      const files: unknown = JSON.parse(row.files_changed);
      return {
        id: row.id,
        summary: row.summary,
        project: row.project,
        filesChanged: Array.isArray(files) ? files.filter((f): f is string => typeof f === 'string') : [],
        createdAt: row.created_at,
        sizeBytes: row.size_bytes,
      };
    });
  }

  countSessions(): number {
    const row = this.guard(() =>
      this.db.prepare<[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM sessions`).get(),
    );
    return row?.cnt ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

