import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

// ============================================================================
// Categories & states
// ============================================================================

export const MEMORY_CATEGORIES = [
  'knowledge',
  'current_state',
  'decision',
  'session',
] as const;
export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

export const MEMORY_STATES = ['clear', 'fuzzy', 'blank'] as const;
export type MemoryState = (typeof MEMORY_STATES)[number];

export function isMemoryCategory(value: unknown): value is MemoryCategory {
  return (
    typeof value === 'string' &&
    (MEMORY_CATEGORIES as readonly string[]).includes(value)
  );
}

// ============================================================================
// Decay model
// ============================================================================

export const WEEK_SECONDS = 7 * 24 * 3600;

/** Fraction of recall lost per elapsed whole week, keyed by significance. */
export const DECAY_RATES: Readonly<Record<number, number>> = {
  10: 0,
  9: 0.01,
  8: 0.02,
  7: 0.05,
  6: 0.08,
  5: 0.1,
  4: 0.15,
  3: 0.2,
  2: 0.3,
  1: 0.5,
};

export const MIN_SIGNIFICANCE = 1;
export const MAX_SIGNIFICANCE = 10;

export const CLEAR_RECALL = 0.7;
export const CLEAR_MIN_SIGNIFICANCE = 6;
export const FUZZY_RECALL = 0.4;

export const RECALL_BOOST = 0.15;

// ============================================================================
// Runtime configuration
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_HOME = join(homedir(), '.recollect');

export const engineConfigSchema = Type.Object(
  {
    dbPath: Type.String({ default: join(DEFAULT_HOME, 'memory.db') }),
    briefPath: Type.String({ default: join(DEFAULT_HOME, 'memory_brief.md') }),
    briefMaxChars: Type.Integer({ minimum: 500, maximum: 200_000, default: 12_000 }),
    searchLimit: Type.Integer({ minimum: 1, maximum: 200, default: 20 }),
    busyTimeoutMs: Type.Integer({ minimum: 0, default: 5000 }),
    sessionStorageCapBytes: Type.Integer({ minimum: 1, default: 200 * 1024 * 1024 }),
    logLevel: Type.Union(
      LOG_LEVELS.map(level => Type.Literal(level)),
      { default: 'info' },
    ),
  },
  { additionalProperties: false },
);

export type EngineConfig = Static<typeof engineConfigSchema>;

function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}

export const configSchema = {
  parse(value: unknown): EngineConfig {
    const input = value && typeof value === 'object' && !Array.isArray(value) ? value : {};
    const withDefaults = Value.Default(engineConfigSchema, Value.Clone(input));
    if (!Value.Check(engineConfigSchema, withDefaults)) {
      const problems = [...Value.Errors(engineConfigSchema, withDefaults)]
        .map(e => `${e.path || '/'}: ${e.message}`)
        .join('; ');
      throw new Error(`recollect config is invalid: ${problems}`);
    }
    return {
      ...withDefaults,
      dbPath: expandHome(withDefaults.dbPath),
      briefPath: expandHome(withDefaults.briefPath),
    };
  },
};

/**
 * Resolve configuration from the config file and the environment. Later
 * sources win: defaults, then `config.json`, then `RECOLLECT_*` variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const configPath = expandHome(env.RECOLLECT_CONFIG || join(DEFAULT_HOME, 'config.json'));

  let fileConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new Error(`recollect config ${configPath} is not valid JSON: ${String(err)}`);
    }
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      fileConfig = { ...parsed };
    }
  }

  const overrides: Record<string, unknown> = {};
  if (env.RECOLLECT_DB_PATH) overrides.dbPath = env.RECOLLECT_DB_PATH;
  if (env.RECOLLECT_BRIEF_PATH) overrides.briefPath = env.RECOLLECT_BRIEF_PATH;
  if (env.RECOLLECT_LOG_LEVEL) overrides.logLevel = env.RECOLLECT_LOG_LEVEL;
  if (env.RECOLLECT_BRIEF_MAX_CHARS) {
    overrides.briefMaxChars = Number(env.RECOLLECT_BRIEF_MAX_CHARS);
  }

  return configSchema.parse({ ...fileConfig, ...overrides });
}
