import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import type { MemoryCategory } from '../config.js';
import { isDecayEligible } from './decay.js';
import type { MemoryDB } from './memory-db.js';
import type { Brief, BriefScope, MemoryView, SavedSession } from './types.js';

export const DEFAULT_BRIEF_MAX_CHARS = 12_000;
const CONTENT_PREVIEW = 200;
const SESSION_PREVIEW = 160;
const RECENT_SESSIONS = 5;

const SECTION_ORDER: MemoryCategory[] = ['knowledge', 'current_state', 'decision', 'session'];

const SECTION_LABELS: Record<MemoryCategory, string> = {
  knowledge: '## Knowledge',
  current_state: '## Current State',
  decision: '## Decisions',
  session: '## Sessions',
};

export type BriefOptions = {
  nowSec: number;
  maxChars?: number;
  sessions?: SavedSession[];
};

/** Significance desc, then recall desc, then most recently accessed, then id. */
export function comparePriority(a: MemoryView, b: MemoryView): number {
  if (b.significance !== a.significance) return b.significance - a.significance;
  if (b.recall !== a.recall) return b.recall - a.recall;
  if (b.lastAccessedAt !== a.lastAccessedAt) return b.lastAccessedAt - a.lastAccessedAt;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function formatTimestamp(sec: number): string {
  return `${new Date(sec * 1000).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function renderEntry(view: MemoryView): string {
  const decays = isDecayEligible(view.category);
  const content = decays ? truncate(oneLine(view.content), CONTENT_PREVIEW) : oneLine(view.content);
  const meta = decays
    ? `sig ${view.significance}, recall ${view.recall.toFixed(2)}`
    : `sig ${view.significance}`;
  const tags = view.tags.length > 0 ? ` [${view.tags.join(', ')}]` : '';
  return `- **${oneLine(view.title)}** (${meta}) — ${content}${tags}`;
}

function renderSession(session: SavedSession): string {
  const day = formatTimestamp(session.createdAt).slice(0, 10);
  const project = session.project ? ` [${session.project}]` : '';
  return `- ${day}${project} ${truncate(oneLine(session.summary), SESSION_PREVIEW)}`;
}

function omittedFooter(omitted: number): string {
  return `_${omitted} lower-priority memories omitted; use \`recollect search\` to find them._`;
}

/** A line plus its newline. */
function lineCost(line: string): number {
  return line.length + 1;
}

function sessionsCost(sessions: SavedSession[]): number {
  if (sessions.length === 0) return 0;
  return sessions.reduce((n, s) => n + lineCost(renderSession(s)), lineCost('## Recent Sessions') + 1);
}

function render(
  header: string[],
  sections: Map<MemoryCategory, MemoryView[]>,
  kept: Set<string>,
  sessions: SavedSession[],
  omitted: number,
): string {
  const lines = [...header];

  for (const category of SECTION_ORDER) {
    const entries = (sections.get(category) ?? []).filter(v => kept.has(v.id));
    if (entries.length === 0) continue;
    lines.push(SECTION_LABELS[category]);
    for (const v of entries) lines.push(renderEntry(v));
    lines.push('');
  }

  if (sessions.length > 0) {
    lines.push('## Recent Sessions');
    for (const s of sessions) lines.push(renderSession(s));
    lines.push('');
  }

  if (omitted > 0) lines.push(omittedFooter(omitted));

  return `${lines.join('\n').trimEnd()}\n`;
}

/**
 * Rank the non-Blank memories into category sections and render them under
 * the size cap. Entries are dropped lowest priority first: recent sessions,
 * then decision/session memories, then knowledge/current_state memories.
 */
export function compileBrief(views: MemoryView[], options: BriefOptions): Brief {
  const maxChars = options.maxChars ?? DEFAULT_BRIEF_MAX_CHARS;
  const live = views.filter(v => v.state !== 'blank');

  const sections = new Map<MemoryCategory, MemoryView[]>();
  for (const category of SECTION_ORDER) {
    sections.set(category, live.filter(v => v.category === category).sort(comparePriority));
  }

  const clear = live.filter(v => v.state === 'clear').length;
  const header = [
    '# Memory Brief',
    `_Generated: ${formatTimestamp(options.nowSec)} | ${live.length} memories (${clear} clear, ${live.length - clear} fuzzy)_`,
    '',
  ];

  const fading = live.filter(v => isDecayEligible(v.category)).sort(comparePriority).reverse();
  const lasting = live.filter(v => !isDecayEligible(v.category)).sort(comparePriority).reverse();
  const dropOrder = [...fading, ...lasting];

  // Sizes are tracked per line so the cap check never re-renders. No rendered
  // line ends in whitespace, so the trailing blank line is the only thing
  // render() trims.
  const entryCost = new Map(live.map(v => [v.id, lineCost(renderEntry(v))]));
  const sectionSize = new Map<MemoryCategory, number>();
  let size = header.reduce((n, line) => n + lineCost(line), 0);
  for (const category of SECTION_ORDER) {
    const entries = sections.get(category) ?? [];
    sectionSize.set(category, entries.length);
    if (entries.length === 0) continue;
    size += lineCost(SECTION_LABELS[category]) + 1;
    for (const v of entries) size += entryCost.get(v.id) ?? 0;
  }

  const kept = new Set(live.map(v => v.id));
  let sessions = (options.sessions ?? []).slice(0, RECENT_SESSIONS);
  const omitted: string[] = [];
  const renderedLength = (): number => {
    const total = size + sessionsCost(sessions);
    return omitted.length > 0 ? total + lineCost(omittedFooter(omitted.length)) : total - 1;
  };

  while (renderedLength() > maxChars) {
    if (sessions.length > 0) {
      sessions = sessions.slice(0, -1);
      continue;
    }
    const next = dropOrder[omitted.length];
    if (!next) break;
    kept.delete(next.id);
    omitted.push(next.id);
    size -= entryCost.get(next.id) ?? 0;
    const left = (sectionSize.get(next.category) ?? 1) - 1;
    sectionSize.set(next.category, left);
    if (left === 0) size -= lineCost(SECTION_LABELS[next.category]) + 1;
  }

  const text = render(header, sections, kept, sessions, omitted.length);
  const included = SECTION_ORDER.flatMap(c => (sections.get(c) ?? []).filter(v => kept.has(v.id)).map(v => v.id));
  return { text, included, omitted };
}

/** Global memories plus, when a project is given, that project's memories. */
export function inScope(view: MemoryView, scope: BriefScope): boolean {
  if (view.project === null) return true;
  return scope.project !== undefined && scope.project !== null && view.project === scope.project;
}

export function buildBrief(
  db: MemoryDB,
  scope: BriefScope = {},
  options: { maxChars?: number } = {},
): Brief {
  const nowSec = Math.floor(Date.now() / 1000);
  const views = db.list().filter(v => inScope(v, scope));
  const sessions = db.getSessions(RECENT_SESSIONS, scope.project ?? undefined);
  return compileBrief(views, { nowSec, maxChars: options.maxChars, sessions });
}

/**
 * Write the brief to every target path. The file is a projection of the
 * store and can be regenerated at any time.
 */
export function writeBrief(
  db: MemoryDB,
  options: { paths: string[]; scope?: BriefScope; maxChars?: number },
): Brief {
  const brief = buildBrief(db, options.scope, { maxChars: options.maxChars });
  for (const path of options.paths) {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, brief.text, 'utf-8');
  }
  return brief;
}
