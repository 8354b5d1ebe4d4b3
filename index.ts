/**
 * recollect: long-lived memory for coding assistant sessions.
 *
 * One SQLite store holds every memory:
 *   1. Records age by an importance-weighted weekly decay and are read as
 *      Clear, Fuzzy or Blank
 *   2. FTS5 search ranks title phrase hits first; every hit is reinforced
 *
 * Decay is never run on a timer. Reads compute it lazily, `decay()` persists
 * it, and `prune()` drops decision/session memories that have faded out.
 */

export {
  CLEAR_MIN_SIGNIFICANCE,
  CLEAR_RECALL,
  DECAY_RATES,
  DEFAULT_HOME,
  FUZZY_RECALL,
  LOG_LEVELS,
  MEMORY_CATEGORIES,
  MEMORY_STATES,
  RECALL_BOOST,
  WEEK_SECONDS,
  configSchema,
  engineConfigSchema,
  isMemoryCategory,
  loadConfig,
  type EngineConfig,
  type LogLevel,
  type MemoryCategory,
  type MemoryState,
} from './config.js';

export { MemoryDB, toView, type ImportOutcome, type MemoryDBOptions } from './src/memory-db.js';
export {
  applyDecay,
  boostRecall,
  clampRecall,
  classifyState,
  decayRate,
  isDecayEligible,
  weeksElapsed,
  type DecayInput,
  type DecayOutcome,
} from './src/decay.js';
export {
  buildMatchQuery,
  compareResults,
  normalizeRanks,
  phraseTier,
  queryTerms,
  relevanceScore,
} from './src/search.js';
export {
  DEFAULT_BRIEF_MAX_CHARS,
  buildBrief,
  comparePriority,
  compileBrief,
  inScope,
  renderEntry,
  writeBrief,
  type BriefOptions,
} from './src/brief.js';
export { migrate, toImportRecord, type MigrationReport } from './src/migrate.js';
export {
  EXPORT_FORMAT,
  EXPORT_VERSION,
  exportRecords,
  exportText,
  serializeExport,
  type ExportDocument,
} from './src/export.js';
export {
  InvalidInputError,
  MemoryError,
  NotFoundError,
  SchemaMismatchError,
  SourceNotFoundError,
  StoreUnavailableError,
  type MemoryErrorCode,
} from './src/errors.js';
export { createLogger, silentLogger, type Logger } from './src/logger.js';
export { createProgram, defaultContext, type CliContext } from './src/cli.js';
export type * from './src/types.js';
