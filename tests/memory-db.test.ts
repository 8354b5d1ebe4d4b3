import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  InvalidInputError,
  MemoryDB,
  NotFoundError,
  WEEK_SECONDS,
  boostRecall,
  type NewMemory,
} from '../index.js';

const T0 = Date.UTC(2026, 0, 5, 12, 0, 0);
const T0_SEC = T0 / 1000;

function makeMemory(overrides: Partial<NewMemory> = {}): NewMemory {
  return {
    category: overrides.category ?? 'decision',
    significance: overrides.significance ?? 7,
    title: overrides.title ?? 'Chose SQLite for storage',
    content: overrides.content ?? 'Embedded database, no server to run',
    ...(overrides.tags ? { tags: overrides.tags } : {}),
    ...(overrides.project !== undefined ? { project: overrides.project } : {}),
  };
}

function advanceWeeks(weeks: number): void {
  vi.setSystemTime(T0 + weeks * WEEK_SECONDS * 1000);
}

describe('MemoryDB', () => {
  let db: MemoryDB;
  let dir: string;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
    dir = mkdtempSync(join(tmpdir(), 'recollect-test-'));
    db = new MemoryDB(join(dir, 'memory.db'));
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
    vi.useRealTimers();
  });

  // ---- Add & read ----

  describe('add', () => {
    it('creates a record at full recall', () => {
      const view = db.add(makeMemory());

      expect(view.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(view.recall).toBe(1);
      expect(view.createdAt).toBe(T0_SEC);
      expect(view.lastAccessedAt).toBe(T0_SEC);
      expect(view.lastDecayAt).toBe(T0_SEC);
      expect(view.source).toBe('manual');
      expect(view.state).toBe('clear');
      expect(db.get(view.id).title).toBe('Chose SQLite for storage');
    });

    it('classifies low significance as fuzzy even at full recall', () => {
      expect(db.add(makeMemory({ significance: 5 })).state).toBe('fuzzy');
    });

    it('normalizes tags into a sorted set', () => {
      const view = db.add(makeMemory({ tags: [' Storage', 'db', 'storage', ''] }));
      expect(view.tags).toEqual(['db', 'storage']);
      expect(db.get(view.id).tags).toEqual(['db', 'storage']);
    });

    it.each([0, 11, 2.5, Number.NaN])('rejects significance %s without writing', sig => {
      expect(() => db.add(makeMemory({ significance: sig }))).toThrow(InvalidInputError);
      expect(db.count()).toBe(0);
    });

    it('rejects an unknown category', () => {
      expect(() => db.add(makeMemory({ category: 'gossip' }))).toThrow(/unknown category 'gossip'/);
      expect(db.count()).toBe(0);
    });

    it('rejects an empty title', () => {
      expect(() => db.add(makeMemory({ title: '   ' }))).toThrow('title must not be empty');
    });

    it('keeps a project key and treats a blank one as global', () => {
      expect(db.add(makeMemory({ project: 'alpha' })).project).toBe('alpha');
      expect(db.add(makeMemory({ project: '  ' })).project).toBeNull();
    });
  });

  describe('get / delete', () => {
    it('throws NotFoundError for unknown ids', () => {
      expect(() => db.get('missing')).toThrow(NotFoundError);
      expect(() => db.delete('missing')).toThrow('memory missing not found');
    });

    it('deletes a record and its index entry', () => {
      const view = db.add(makeMemory());
      db.delete(view.id);
      expect(db.count()).toBe(0);
      expect(db.search('sqlite')).toEqual([]);
    });
  });

  describe('list', () => {
    it('computes decay lazily without persisting it', () => {
      const view = db.add(makeMemory({ significance: 1 }));
      advanceWeeks(2);

      const [listed] = db.list();
      expect(listed.recall).toBe(0.25);
      expect(listed.state).toBe('blank');
      expect(db.records()[0].recall).toBe(1);
      expect(db.list({ state: 'blank' }).map(v => v.id)).toEqual([view.id]);
    });

    it('filters by category and project', () => {
      db.add(makeMemory({ category: 'knowledge', project: 'alpha' }));
      db.add(makeMemory({ category: 'session' }));
      expect(db.list({ category: 'knowledge' })).toHaveLength(1);
      expect(db.list({ project: null })).toHaveLength(1);
      expect(db.list({ project: 'alpha' })[0].category).toBe('knowledge');
    });
  });

  // ---- Update ----

  describe('update', () => {
    it('settles decay owed under the old significance first', () => {
      const view = db.add(makeMemory({ significance: 1 }));
      advanceWeeks(1);

      const updated = db.update(view.id, { significance: 10 });
      expect(updated.recall).toBe(0.5);
      expect(updated.lastDecayAt).toBe(T0_SEC + WEEK_SECONDS);

      advanceWeeks(6);
      expect(db.get(view.id).recall).toBe(0.5);
    });

    it('reindexes a changed title', () => {
      const view = db.add(makeMemory());
      db.update(view.id, { title: 'Chose Postgres after all', tags: ['DB'] });

      expect(db.search('postgres').map(r => r.record.id)).toEqual([view.id]);
      expect(db.get(view.id).tags).toEqual(['db']);
      expect(db.get(view.id).category).toBe('decision');
    });

    it('rejects an empty patch and unknown ids', () => {
      const view = db.add(makeMemory());
      expect(() => db.update(view.id, {})).toThrow('nothing to update');
      expect(() => db.update('missing', { title: 'x' })).toThrow(NotFoundError);
      expect(() => db.update(view.id, { significance: 12 })).toThrow(InvalidInputError);
    });
  });

  // ---- Decay pass ----

  describe('decay', () => {
    it('persists decay and reports counts per state', () => {
      const decision = db.add(makeMemory({ significance: 1 }));
      const knowledge = db.add(makeMemory({ category: 'knowledge', significance: 1 }));
      advanceWeeks(2);

      const report = db.decay();
      expect(report).toEqual({ updated: 2, failed: 0, clear: 0, fuzzy: 1, blank: 1 });

      const stored = new Map(db.records().map(r => [r.id, r]));
      expect(stored.get(decision.id)?.recall).toBe(0.25);
      expect(stored.get(decision.id)?.lastDecayAt).toBe(T0_SEC + 2 * WEEK_SECONDS);
      expect(stored.get(knowledge.id)?.recall).toBe(1);
    });

    it('is idempotent within the same week', () => {
      const view = db.add(makeMemory({ significance: 3 }));
      advanceWeeks(1);
      db.decay();
      const report = db.decay();

      expect(report.updated).toBe(0);
      expect(db.get(view.id).recall).toBe(0.8);
    });

    it('records the time of the last pass', () => {
      expect(db.stats().lastDecayRun).toBeNull();
      db.decay();
      expect(db.stats().lastDecayRun).toBe(T0_SEC);
    });
  });

  // ---- Search & boost ----

  describe('search', () => {
    it('boosts the decayed recall of every hit by 0.15', () => {
      const view = db.add(makeMemory({ significance: 3 }));
      advanceWeeks(1);

      const [hit] = db.search('sqlite');
      expect(hit.record.id).toBe(view.id);
      expect(hit.record.recall).toBe(boostRecall(0.8));
      expect(hit.record.lastAccessedAt).toBe(T0_SEC + WEEK_SECONDS);

      const stored = db.records()[0];
      expect(stored.recall).toBe(boostRecall(0.8));
      expect(stored.lastDecayAt).toBe(T0_SEC + WEEK_SECONDS);
    });

    it('boosts a record once even when several terms match it', () => {
      db.add(makeMemory({ significance: 1 }));
      advanceWeeks(1);

      const [hit] = db.search('sqlite storage embedded');
      expect(hit.record.recall).toBe(boostRecall(0.5));
    });

    it('never lifts recall above 1', () => {
      db.add(makeMemory());
      expect(db.search('sqlite')[0].record.recall).toBe(1);
    });

    it('still finds blank records', () => {
      db.add(makeMemory({ significance: 1 }));
      advanceWeeks(3);

      const [hit] = db.search('sqlite');
      expect(hit.record.recall).toBe(boostRecall(0.125));
    });

    it('ranks a title phrase above content and term matches', () => {
      const terms = db.add(makeMemory({ title: 'Database notes', content: 'migration comes later' }));
      const body = db.add(makeMemory({ title: 'Meeting', content: 'We agreed on the database migration plan today' }));
      const title = db.add(makeMemory({ title: 'Database migration plan', content: 'Three phases' }));

      const ids = db.search('database migration plan').map(r => r.record.id);
      expect(ids).toEqual([title.id, body.id, terms.id]);
    });

    it('breaks relevance ties by significance', () => {
      const low = db.add(makeMemory({ significance: 4, title: 'Redis cache', content: 'Redis cache layer' }));
      const high = db.add(makeMemory({ significance: 8, title: 'Redis cache', content: 'Redis cache layer' }));

      expect(db.search('redis').map(r => r.record.id)).toEqual([high.id, low.id]);
    });

    it('matches tags', () => {
      const view = db.add(makeMemory({ title: 'Queue choice', content: 'Went with a job table', tags: ['postgres'] }));
      expect(db.search('postgres').map(r => r.record.id)).toEqual([view.id]);
    });

    it('boosts only the returned records when a limit applies', () => {
      db.add(makeMemory({ title: 'Cache one', content: 'cache' }));
      db.add(makeMemory({ title: 'Cache two', content: 'cache' }));
      db.add(makeMemory({ title: 'Cache three', content: 'cache' }));
      advanceWeeks(1);

      const results = db.search('cache', 2);
      expect(results).toHaveLength(2);
      const returned = new Set(results.map(r => r.record.id));
      const untouched = db.records().filter(r => !returned.has(r.id));
      expect(untouched).toHaveLength(1);
      expect(untouched[0].lastAccessedAt).toBe(T0_SEC);
    });

    it('rejects an empty query', () => {
      expect(() => db.search('   ')).toThrow(InvalidInputError);
    });

    it('finds titles written with hyphens and dots', () => {
      const rate = db.add(makeMemory({ title: 'rate-limit policy', content: 'Caps requests per minute' }));
      const loader = db.add(makeMemory({ title: 'config.ts loader', content: 'Reads settings from disk' }));
      db.add(makeMemory());

      expect(db.search('rate-limit').map(r => r.record.id)).toEqual([rate.id]);
      expect(db.search('config.ts').map(r => r.record.id)).toEqual([loader.id]);
    });

    it('returns nothing for a query made only of stop words', () => {
      db.add(makeMemory({ title: 'the and', content: 'is was' }));
      expect(db.search('the and')).toEqual([]);
    });
  });

  // ---- Prune ----

  describe('prune', () => {
    function importAtRecall(category: 'decision' | 'current_state', recall: number): string {
      const id = `${category}-faded`;
      db.importRecord({
        id,
        category,
        significance: 5,
        title: `Faded ${category}`,
        content: 'barely remembered',
        tags: [],
        project: null,
        source: 'test',
        createdAt: T0_SEC,
        lastAccessedAt: T0_SEC,
        recall,
        lastDecayAt: T0_SEC,
      });
      return id;
    }

    it('removes a blank decision but never a current_state record', () => {
      const decision = importAtRecall('decision', 0.1);
      const state = importAtRecall('current_state', 0.1);

      const report = db.prune();
      expect(report).toEqual({ count: 1, ids: [decision], failed: 0 });
      expect(() => db.get(decision)).toThrow(NotFoundError);
      expect(db.get(state).recall).toBe(1);
    });

    it('keeps fuzzy decay-eligible records', () => {
      importAtRecall('decision', 0.5);
      expect(db.prune().count).toBe(0);
      expect(db.count()).toBe(1);
    });

    it('lists candidates on a dry run without deleting', () => {
      const decision = importAtRecall('decision', 0.1);
      expect(db.pruneCandidates()).toEqual([decision]);
      expect(db.count()).toBe(1);
    });

    it('prunes records that decayed to blank over time', () => {
      db.add(makeMemory({ significance: 1 }));
      const kept = db.add(makeMemory({ significance: 9 }));
      advanceWeeks(2);

      expect(db.prune().count).toBe(1);
      expect(db.records().map(r => r.id)).toEqual([kept.id]);
    });
  });

  // ---- Unreadable rows ----

  describe('unreadable rows', () => {
    function corruptTags(id: string): void {
      const raw = new Database(join(dir, 'memory.db'));
      raw.prepare(`UPDATE memories SET tags = 'not-json' WHERE id = ?`).run(id);
      raw.close();
    }

    it('prunes the other blank records and counts the failure', () => {
      db.importRecord({
        id: 'faded',
        category: 'decision',
        significance: 5,
        title: 'Faded decision',
        content: 'barely remembered',
        tags: [],
        project: null,
        source: 'test',
        createdAt: T0_SEC,
        lastAccessedAt: T0_SEC,
        recall: 0.1,
        lastDecayAt: T0_SEC,
      });
      const broken = db.add(makeMemory({ title: 'Broken tags' }));
      corruptTags(broken.id);

      expect(db.prune()).toEqual({ count: 1, ids: ['faded'], failed: 1 });
      expect(db.count()).toBe(1);
    });

    it('decays the rest of the store', () => {
      db.add(makeMemory({ significance: 3 }));
      const broken = db.add(makeMemory({ title: 'Broken tags' }));
      corruptTags(broken.id);
      advanceWeeks(1);

      const report = db.decay();
      expect(report.updated).toBe(1);
      expect(report.failed).toBe(1);
    });

    it('leaves them out of listings, stats and search', () => {
      const good = db.add(makeMemory());
      const broken = db.add(makeMemory({ title: 'Broken tags' }));
      corruptTags(broken.id);

      expect(db.list().map(v => v.id)).toEqual([good.id]);
      expect(db.stats().total).toBe(1);
      expect(db.search('database').map(r => r.record.id)).toEqual([good.id]);
    });
  });

  // ---- Stats ----

  describe('stats', () => {
    it('counts per category and state', () => {
      db.add(makeMemory({ category: 'knowledge', significance: 9 }));
      db.add(makeMemory({ category: 'session', significance: 1 }));
      db.saveSession('Wired the CLI');
      advanceWeeks(2);

      const stats = db.stats();
      expect(stats.total).toBe(2);
      expect(stats.byCategory.knowledge).toBe(1);
      expect(stats.byState).toEqual({ clear: 1, fuzzy: 0, blank: 1 });
      expect(stats.byCategoryState.session.blank).toBe(1);
      expect(stats.averageRecall).toBe(0.625);
      expect(stats.sessions).toBe(1);
    });
  });

  // ---- Import ----

  describe('importRecord', () => {
    it('skips identical content and renames conflicting content', () => {
      const view = db.add(makeMemory());
      const record = db.records()[0];

      expect(db.importRecord(record)).toEqual({ outcome: 'skipped', id: view.id });
      expect(db.importRecord({ ...record, content: 'Something else' })).toEqual({
        outcome: 'renamed',
        id: `${view.id}~1`,
      });
      expect(db.importRecord({ ...record, content: 'Something else' })).toEqual({
        outcome: 'skipped',
        id: `${view.id}~1`,
      });
      expect(db.count()).toBe(2);
    });
  });
});

describe('MemoryDB sessions', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recollect-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists sessions newest first', () => {
    const db = new MemoryDB(join(dir, 'memory.db'));
    const first = db.saveSession('Set up the schema', { project: 'alpha', filesChanged: ['db.ts'] });
    const second = db.saveSession('Added search');

    const sessions = db.getSessions();
    expect(sessions.map(s => s.id)).toEqual([second, first]);
    expect(sessions[1]).toMatchObject({ project: 'alpha', filesChanged: ['db.ts'] });
    expect(db.getSessions(10, 'alpha').map(s => s.id)).toEqual([first]);
    db.close();
  });

  it('drops the oldest sessions past the storage cap', () => {
    const db = new MemoryDB(join(dir, 'memory.db'), { sessionStorageCapBytes: 100 });
    db.saveSession('a'.repeat(60));
    const newest = db.saveSession('b'.repeat(60));

    expect(db.getSessions().map(s => s.id)).toEqual([newest]);
    expect(db.getSessions()[0].sizeBytes).toBe(62);
    db.close();
  });

  it('rejects an empty summary', () => {
    const db = new MemoryDB(join(dir, 'memory.db'));
    expect(() => db.saveSession('  ')).toThrow(InvalidInputError);
    db.close();
  });
});
