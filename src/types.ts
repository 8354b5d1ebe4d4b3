import type { MemoryCategory, MemoryState } from '../config.js';

export type MemoryRecord = {
  id: string;
  category: MemoryCategory;
  significance: number;
  title: string;
  content: string;
  tags: string[];
  project: string | null;
  source: string;
  createdAt: number;
  lastAccessedAt: number;
  recall: number;
  lastDecayAt: number;
};

/** A record together with its classification at the time it was read. */
export type MemoryView = MemoryRecord & { state: MemoryState };

export type NewMemory = {
  category: string;
  significance: number;
  title: string;
  content: string;
  tags?: string[];
  project?: string | null;
  source?: string;
};

export type MemoryPatch = {
  significance?: number;
  title?: string;
  content?: string;
  tags?: string[];
};

export type SearchResult = {
  record: MemoryView;
  score: number;
};

export type DecayReport = {
  updated: number;
  failed: number;
  clear: number;
  fuzzy: number;
  blank: number;
};

export type PruneReport = {
  count: number;
  ids: string[];
  failed: number;
};

export type StoreStats = {
  total: number;
  byCategory: Record<MemoryCategory, number>;
  byState: Record<MemoryState, number>;
  byCategoryState: Record<MemoryCategory, Record<MemoryState, number>>;
  averageRecall: number;
  lastDecayRun: number | null;
  sessions: number;
};

export type SavedSession = {
  id: number;
  summary: string;
  project: string;
  filesChanged: string[];
  createdAt: number;
  sizeBytes: number;
};

export type BriefScope = {
  project?: string | null;
};

export type Brief = {
  text: string;
  included: string[];
  omitted: string[];
};
