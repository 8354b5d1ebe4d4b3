import {
  MAX_SIGNIFICANCE,
  MEMORY_CATEGORIES,
  MIN_SIGNIFICANCE,
  isMemoryCategory,
  type MemoryCategory,
} from '../config.js';
import { InvalidInputError } from './errors.js';
import type { MemoryPatch, MemoryRecord, NewMemory } from './types.js';

/** Column layout of the `memories` table. */
export type MemoryRow = {
  id: string;
  category: string;
  significance: number;
  title: string;
  content: string;
  tags: string;
  project: string | null;
  source: string;
  created_at: number;
  last_accessed_at: number;
  recall: number;
  last_decay_at: number;
};

export function parseTags(raw: string): string[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`tags column is not JSON: ${raw}`);
  }
  if (!Array.isArray(parsed)) throw new Error(`tags column is not an array: ${raw}`);
  return parsed.filter((t): t is string => typeof t === 'string');
}

export function rowToRecord(row: MemoryRow): MemoryRecord {
  if (!isMemoryCategory(row.category)) {
    throw new Error(`memory ${row.id} has unknown category '${row.category}'`);
  }
  return {
    id: row.id,
    category: row.category,
    significance: row.significance,
    title: row.title,
    content: row.content,
    tags: parseTags(row.tags),
    project: row.project ?? null,
    source: row.source,
    createdAt: row.created_at,
    lastAccessedAt: row.last_accessed_at,
    recall: row.recall,
    lastDecayAt: row.last_decay_at,
  };
}

/** Tags are a set: trimmed, lowercased, de-duplicated and sorted. */
export function normalizeTags(tags: readonly string[] | undefined): string[] {
  if (!tags) return [];
  const set = new Set<string>();
  for (const tag of tags) {
    const t = tag.trim().toLowerCase();
    if (t) set.add(t);
  }
  return [...set].sort();
}

export function validateCategory(category: string): MemoryCategory {
  if (!isMemoryCategory(category)) {
    throw new InvalidInputError(
      `unknown category '${category}' (expected one of: ${MEMORY_CATEGORIES.join(', ')})`,
    );
  }
  return category;
}

export function validateSignificance(significance: number): number {
  if (
    !Number.isInteger(significance) ||
    significance < MIN_SIGNIFICANCE ||
    significance > MAX_SIGNIFICANCE
  ) {
    throw new InvalidInputError(
      `significance must be an integer from ${MIN_SIGNIFICANCE} to ${MAX_SIGNIFICANCE}, got ${significance}`,
    );
  }
  return significance;
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new InvalidInputError(`${field} must not be empty`);
  return trimmed;
}

export type ValidatedMemory = {
  category: MemoryCategory;
  significance: number;
  title: string;
  content: string;
  tags: string[];
  project: string | null;
  source: string;
};

export function validateNewMemory(input: NewMemory): ValidatedMemory {
  const project = input.project?.trim();
  return {
    category: validateCategory(input.category),
    significance: validateSignificance(input.significance),
    title: requireText('title', input.title),
    content: requireText('content', input.content),
    tags: normalizeTags(input.tags),
    project: project ? project : null,
    source: input.source?.trim() || 'manual',
  };
}

export function validatePatch(patch: MemoryPatch): MemoryPatch {
  const out: MemoryPatch = {};
  if (patch.significance !== undefined) {
    out.significance = validateSignificance(patch.significance);
  }
  if (patch.title !== undefined) out.title = requireText('title', patch.title);
  if (patch.content !== undefined) out.content = requireText('content', patch.content);
  if (patch.tags !== undefined) out.tags = normalizeTags(patch.tags);
  if (Object.keys(out).length === 0) {
    throw new InvalidInputError('nothing to update');
  }
  return out;
}

/** Identity-independent content comparison used when merging stores. */
export function sameContent(
  a: Pick<MemoryRecord, 'category' | 'significance' | 'title' | 'content' | 'tags'>,
  b: Pick<MemoryRecord, 'category' | 'significance' | 'title' | 'content' | 'tags'>,
): boolean {
  const tagsA = normalizeTags(a.tags);
  const tagsB = normalizeTags(b.tags);
  return (
    a.category === b.category &&
    a.significance === b.significance &&
    a.title === b.title &&
    a.content === b.content &&
    tagsA.length === tagsB.length &&
    tagsA.every((t, i) => t === tagsB[i])
  );
}
