import { Command, InvalidArgumentError } from 'commander';
import { basename, join, resolve } from 'node:path';

import { MEMORY_CATEGORIES, type EngineConfig } from '../config.js';
import { buildBrief, writeBrief } from './brief.js';
import { InvalidInputError, MemoryError } from './errors.js';
import { exportRecords, exportText, serializeExport } from './export.js';
import { silentLogger, type Logger } from './logger.js';
import { MemoryDB } from './memory-db.js';
import { migrate } from './migrate.js';
import type { MemoryPatch, MemoryView } from './types.js';

export const BRIEF_FILENAME = 'memory_brief.md';

export type CliContext = {
  config: EngineConfig;
  logger: Logger;
  openStore: () => MemoryDB;
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
};

/** 2 when the store itself is unreachable, 1 for everything the caller got wrong. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof MemoryError) return err.code === 'STORE_UNAVAILABLE' ? 2 : 1;
  return 1;
}

function run(ctx: CliContext, action: (db: MemoryDB) => void): void {
  let db: MemoryDB | undefined;
  try {
    db = ctx.openStore();
    action(db);
  } catch (err) {
    ctx.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    ctx.setExitCode(exitCodeFor(err));
  } finally {
    db?.close();
  }
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function formatDate(sec: number): string {
  return new Date(sec * 1000).toISOString().slice(0, 16).replace('T', ' ');
}

function summarize(view: MemoryView): string {
  return `[${view.category}] ${view.title} (sig=${view.significance}, recall=${view.recall.toFixed(2)}, state=${view.state})`;
}

// ============================================================================
// Commands
// ============================================================================

export function registerAddCommand(program: Command, ctx: CliContext): void {
  program
    .command('add')
    .description(`Add a memory (categories: ${MEMORY_CATEGORIES.join(', ')}; significance 1-10)`)
    .argument('<category>', 'memory category')
    .argument('<significance>', '1 (gone in two weeks) to 10 (never fades)')
    .argument('<title>', 'short title')
    .argument('<content>', 'memory content')
    .argument('[tags]', 'comma-separated tags')
    .option('-p, --project <name>', 'project the memory belongs to (default: global)')
    .action(
      (category: string, significance: string, title: string, content: string, tags: string | undefined, opts: { project?: string }) => {
        run(ctx, db => {
          const view = db.add({
            category,
            significance: Number(significance),
            title,
            content,
            tags: tags ? splitList(tags) : [],
            project: opts.project ?? null,
            source: 'manual',
          });
          ctx.out(`Added memory ${view.id}: [${view.category}] sig=${view.significance} — ${view.title}`);
        });
      },
    );
}

export function registerSearchCommand(program: Command, ctx: CliContext): void {
  program
    .command('search')
    .description('Search memories (every hit is reinforced)')
    .argument('<query...>', 'search terms')
    .option('-l, --limit <n>', 'maximum results', parsePositiveInt)
    .option('--json', 'print results as JSON')
    .action((words: string[], opts: { limit?: number; json?: boolean }) => {
      const query = words.join(' ');
      run(ctx, db => {
        const results = db.search(query, opts.limit ?? ctx.config.searchLimit);
        if (opts.json) {
          ctx.out(JSON.stringify(results, null, 2));
          return;
        }
        if (results.length === 0) {
          ctx.out(`No memories found for: ${query}`);
          return;
        }
        ctx.out(`Found ${results.length} memories for: ${query}`);
        for (const { record } of results) {
          ctx.out('');
          ctx.out(`[${formatDate(record.createdAt)}] ${summarize(record)}`);
          ctx.out(`  ${record.content.slice(0, 200)}`);
          ctx.out(`  id: ${record.id}`);
        }
      });
    });
}

export function registerStatusCommand(program: Command, ctx: CliContext): void {
  program
    .command('status')
    .description('Show memory statistics')
    .action(() => {
      run(ctx, db => {
        const stats = db.stats();
        ctx.out('Memory Status');
        ctx.out('='.repeat(40));
        ctx.out(`Database:           ${db.dbPath}`);
        ctx.out(`Total memories:     ${stats.total}`);
        ctx.out(`  Clear:            ${stats.byState.clear}`);
        ctx.out(`  Fuzzy:            ${stats.byState.fuzzy}`);
        ctx.out(`  Blank:            ${stats.byState.blank}`);
        ctx.out(`Avg recall:         ${stats.averageRecall.toFixed(2)}`);
        ctx.out(`Last decay:         ${stats.lastDecayRun === null ? 'never' : formatDate(stats.lastDecayRun)}`);
        ctx.out('');
        ctx.out('By category:');
        for (const category of MEMORY_CATEGORIES) {
          const s = stats.byCategoryState[category];
          ctx.out(
            `  ${category}: ${stats.byCategory[category]} (${s.clear} clear, ${s.fuzzy} fuzzy, ${s.blank} blank)`,
          );
        }
        ctx.out('');
        ctx.out(`Saved sessions:     ${stats.sessions}`);
      });
    });
}

export function registerDecayCommand(program: Command, ctx: CliContext): void {
  program
    .command('decay')
    .description('Apply weekly decay to every memory')
    .option('--prune', 'remove forgotten memories afterwards')
    .action((opts: { prune?: boolean }) => {
      run(ctx, db => {
        const report = db.decay();
        ctx.out(`Decay applied to ${report.updated} memories.`);
        ctx.out(`  Clear: ${report.clear}, Fuzzy: ${report.fuzzy}, Blank: ${report.blank}`);
        if (report.failed > 0) ctx.out(`  ${report.failed} memories could not be updated`);
        if (opts.prune) {
          const pruned = db.prune();
          ctx.out(`Pruned ${pruned.count} forgotten memories.`);
        }
      });
    });
}

export function registerPruneCommand(program: Command, ctx: CliContext): void {
  program
    .command('prune')
    .description('Remove decayed memories that have faded to blank')
    .option('--dry-run', 'list what would be removed without deleting')
    .action((opts: { dryRun?: boolean }) => {
      run(ctx, db => {
        if (opts.dryRun) {
          const ids = db.pruneCandidates();
          ctx.out(`Would prune ${ids.length} forgotten memories.`);
          for (const id of ids) ctx.out(`  ${summarize(db.get(id))}`);
          return;
        }
        const report = db.prune();
        ctx.out(`Pruned ${report.count} forgotten memories.`);
        if (report.failed > 0) ctx.out(`  ${report.failed} memories could not be removed`);
      });
    });
}

export function registerBriefCommand(program: Command, ctx: CliContext): void {
  program
    .command('brief')
    .description('Compile the memory brief read at session start')
    .option('--project [dir]', 'also include that project and write the brief into it (default: cwd)')
    .option('--stdout', 'print the brief instead of writing it')
    .action((opts: { project?: string | true; stdout?: boolean }) => {
      const projectDir =
        opts.project === undefined ? undefined : resolve(opts.project === true ? process.cwd() : opts.project);
      const scope = { project: projectDir ? basename(projectDir) : null };

      run(ctx, db => {
        if (opts.stdout) {
          ctx.out(buildBrief(db, scope, { maxChars: ctx.config.briefMaxChars }).text.trimEnd());
          return;
        }
        const paths = [ctx.config.briefPath];
        if (projectDir) paths.push(join(projectDir, BRIEF_FILENAME));
        const brief = writeBrief(db, { paths, scope, maxChars: ctx.config.briefMaxChars });
        ctx.out(`Brief generated: ${paths[0]}`);
        if (projectDir) ctx.out(`Also written to: ${paths[1]}`);
        ctx.out(`  ${brief.included.length} memories included, ${brief.omitted.length} omitted`);
      });
    });
}

export function registerExportCommand(program: Command, ctx: CliContext): void {
  program
    .command('export')
    .description('Dump every memory (json output can be fed back to migrate)')
    .option('-f, --format <format>', 'text or json', 'text')
    .action((opts: { format: string }) => {
      run(ctx, db => {
        if (opts.format === 'json') {
          ctx.out(serializeExport(exportRecords(db)).trimEnd());
        } else if (opts.format === 'text') {
          ctx.out(exportText(db).trimEnd());
        } else {
          throw new InvalidInputError(`unknown export format '${opts.format}' (expected text or json)`);
        }
      });
    });
}

export function registerMigrateCommand(program: Command, ctx: CliContext): void {
  program
    .command('migrate')
    .description('Import memories from another store or a json export')
    .argument('<path>', 'SQLite store or export file')
    .action((path: string) => {
      run(ctx, db => {
        const report = migrate(db, path, ctx.logger);
        ctx.out(`Migrated ${path}: ${report.imported} imported, ${report.renamed} renamed, ${report.skipped} unchanged`);
        for (const f of report.failed) ctx.out(`  skipped ${f.id}: ${f.reason}`);
        ctx.out(`Store now holds ${db.count()} memories.`);
      });
    });
}

export function registerShowCommand(program: Command, ctx: CliContext): void {
  program
    .command('show')
    .description('Show one memory')
    .argument('<id>', 'memory id')
    .action((id: string) => {
      run(ctx, db => {
        const view = db.get(id);
        ctx.out(summarize(view));
        ctx.out(`  id:       ${view.id}`);
        ctx.out(`  created:  ${formatDate(view.createdAt)}`);
        ctx.out(`  accessed: ${formatDate(view.lastAccessedAt)}`);
        if (view.project) ctx.out(`  project:  ${view.project}`);
        if (view.tags.length > 0) ctx.out(`  tags:     ${view.tags.join(', ')}`);
        ctx.out('');
        ctx.out(view.content);
      });
    });
}

export function registerUpdateCommand(program: Command, ctx: CliContext): void {
  program
    .command('update')
    .description('Change significance, title, content or tags of a memory')
    .argument('<id>', 'memory id')
    .option('-s, --significance <n>', 'new significance (1-10)')
    .option('-t, --title <title>', 'new title')
    .option('-c, --content <content>', 'new content')
    .option('--tags <tags>', 'replace tags (comma-separated)')
    .action((id: string, opts: { significance?: string; title?: string; content?: string; tags?: string }) => {
      const patch: MemoryPatch = {};
      if (opts.significance !== undefined) patch.significance = Number(opts.significance);
      if (opts.title !== undefined) patch.title = opts.title;
      if (opts.content !== undefined) patch.content = opts.content;
      if (opts.tags !== undefined) patch.tags = splitList(opts.tags);
      run(ctx, db => {
        const view = db.update(id, patch);
        ctx.out(`Updated memory ${view.id}: ${summarize(view)}`);
      });
    });
}

export function registerDeleteCommand(program: Command, ctx: CliContext): void {
  program
    .command('delete')
    .description('Delete a memory')
    .argument('<id>', 'memory id')
    .action((id: string) => {
      run(ctx, db => {
        db.delete(id);
        ctx.out(`Deleted memory ${id}`);
      });
    });
}

export function registerSaveSessionCommand(program: Command, ctx: CliContext): void {
  program
    .command('save-session')
    .description('Save a session summary (oldest sessions are dropped past the storage cap)')
    .argument('<summary...>', 'what happened this session')
    .option('-p, --project <name>', 'project name')
    .option('--files <files>', 'files changed (comma-separated)')
    .action((words: string[], opts: { project?: string; files?: string }) => {
      const summary = words.join(' ');
      run(ctx, db => {
        const id = db.saveSession(summary, {
          project: opts.project,
          filesChanged: opts.files ? splitList(opts.files) : [],
        });
        ctx.out(`Session #${id} saved (${db.countSessions()} sessions stored)`);
      });
    });
}

export function registerSessionsCommand(program: Command, ctx: CliContext): void {
  program
    .command('sessions')
    .description('List saved sessions, newest first')
    .option('-l, --limit <n>', 'maximum sessions', parsePositiveInt, 50)
    .action((opts: { limit: number }) => {
      run(ctx, db => {
        const sessions = db.getSessions(opts.limit);
        if (sessions.length === 0) {
          ctx.out('No sessions saved yet.');
          return;
        }
        for (const s of sessions) {
          ctx.out(`#${s.id} | ${formatDate(s.createdAt)}${s.project ? ` [${s.project}]` : ''}`);
          ctx.out(`  ${s.summary.slice(0, 200)}`);
          if (s.filesChanged.length > 0) ctx.out(`  Files: ${s.filesChanged.slice(0, 5).join(', ')}`);
        }
      });
    });
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  program
    .name('recollect')
    .description('Long-lived memory for coding assistant sessions')
    .version('0.1.0')
    .configureOutput({
      writeOut: s => ctx.out(s.trimEnd()),
      writeErr: s => ctx.err(s.trimEnd()),
    });

  registerAddCommand(program, ctx);
  registerSearchCommand(program, ctx);
  registerStatusCommand(program, ctx);
  registerDecayCommand(program, ctx);
  registerPruneCommand(program, ctx);
  registerBriefCommand(program, ctx);
  registerExportCommand(program, ctx);
  registerMigrateCommand(program, ctx);
  registerShowCommand(program, ctx);
  registerUpdateCommand(program, ctx);
  registerDeleteCommand(program, ctx);
  registerSaveSessionCommand(program, ctx);
  registerSessionsCommand(program, ctx);

  return program;
}

/** Context wired to the real config, stdout/stderr and process exit code. */
export function defaultContext(config: EngineConfig, logger: Logger = silentLogger): CliContext {
  return {
    config,
    logger,
    openStore: () =>
      new MemoryDB(config.dbPath, {
        logger,
        busyTimeoutMs: config.busyTimeoutMs,
        sessionStorageCapBytes: config.sessionStorageCapBytes,
      }),
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
    setExitCode: code => {
      process.exitCode = code;
    },
  };
}
