/**
 * tapdeck — CLI program
 *
 * commander によるコマンド定義。I/O（設定読み込み、DB オープン、
 * 出力先、HTTP クライアント）は CliDeps として注入され、
 * テストからはインプロセスで実行できる。
 *
 * 終了コード: 0 成功 / 1 使い方・検証エラー / 2 実行時・ネットワークエラー
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type Database from 'better-sqlite3';
import type { AxiosInstance } from 'axios';
import type { AppConfig } from '../config/index.js';
import { createContext, type AppContext } from '../context.js';
import {
  InvalidQueryError,
  NoSessionFoundError,
  NotFoundError,
  TapdeckError,
  UsageError,
  ValidationError,
} from '../types/errors.js';
import type { HeaderMap, Transaction } from '../types/entities.js';
import type { TrafficStats } from '../types/query.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { EXPORT_FORMATS, exportToFile, type ExportFormat } from '../engine/export.js';
import { INGEST_FORMATS, ingestFile, type IngestFormat } from '../engine/ingest.js';
import { ReplayEngine, toCaptureInput } from '../engine/replay.js';
import { AutomationRunner, type RunReport } from '../engine/automation/runner.js';
import { summarizeTargets } from '../engine/automation/scan.js';
import type { SessionAnalysis } from '../engine/analyzer.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_RUNTIME = 2;

/** Characters of a bearer credential ever shown. */
const CREDENTIAL_PREFIX = 12;

export interface CliDeps {
  loadConfig(configPath: string): AppConfig;
  openDatabase(dbPath: string): Database.Database;
  /** Called once with every database the run opened. */
  releaseDatabase?(db: Database.Database): void;
  stdout(line: string): void;
  stderr(line: string): void;
  httpClient?: AxiosInstance;
  /** Delay used by the automation runner between sends. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
  logger?: Logger;
}

type GlobalOptions = {
  db?: string;
  config: string;
  scope?: string;
};

// ============================================================
// ヘルパー
// ============================================================

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return n;
}

function nonNegativeNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('must be a non-negative number');
  }
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Parse `Name: value` pairs given with --header. */
export function parseHeaderArgs(pairs: readonly string[]): HeaderMap {
  const headers: HeaderMap = {};
  for (const pair of pairs) {
    const colon = pair.indexOf(':');
    if (colon <= 0) {
      throw new UsageError(`Invalid header "${pair}"; expected name:value`);
    }
    headers[pair.slice(0, colon).trim()] = pair.slice(colon + 1).trim();
  }
  return headers;
}

function parseId(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new UsageError(`Invalid transaction id: ${value}`);
  }
  return n;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }
  if (
    error instanceof ValidationError ||
    error instanceof InvalidQueryError ||
    error instanceof NotFoundError ||
    error instanceof UsageError
  ) {
    return EXIT_USAGE;
  }
  return EXIT_RUNTIME;
}

function formatRow(tx: Transaction): string {
  return [
    `#${tx.id}`,
    tx.method,
    tx.responseStatus ?? '-',
    `${tx.duration.toFixed(3)}s`,
    tx.url,
  ].join('\t');
}

function formatStats(stats: TrafficStats): string[] {
  const lines = [
    `Total transactions: ${stats.total}`,
    `Unique hosts: ${stats.uniqueHosts}`,
    `Duration avg/min/max: ${stats.avgDuration.toFixed(3)}s / ${stats.minDuration.toFixed(3)}s / ${stats.maxDuration.toFixed(3)}s`,
    `Methods: ${stats.methods.map((m) => `${m.method} ${m.count}`).join(', ')}`,
    `Status codes: ${stats.statusCodes.map((s) => `${s.status ?? 'none'} ${s.count}`).join(', ')}`,
    'Top hosts:',
    ...stats.topHosts.map((h) => `  ${h.host}\t${h.count}`),
    'Slowest:',
    ...stats.slowest.map((s) => `  #${s.id}\t${s.method}\t${s.duration.toFixed(3)}s\t${s.url}`),
  ];
  return lines;
}

function formatSession(analysis: SessionAnalysis): string[] {
  const { bySeverity, byCategory } = analysis;
  return [
    `Analyzed ${analysis.analyzed} transactions, ${analysis.totalFindings} findings`,
    `By severity: high ${bySeverity.high}, warning ${bySeverity.warning}, info ${bySeverity.info}`,
    `By category: security ${byCategory.security}, performance ${byCategory.performance}, best_practice ${byCategory.best_practice}`,
    'Top offenders:',
    ...analysis.topOffenders.map(
      (o) => `  #${o.transactionId}\tscore ${o.score}\t${o.findings} findings\t${o.method}\t${o.url}`,
    ),
  ];
}

function formatRun(report: RunReport): string[] {
  const lines = report.targets.map((t) => {
    const state = t.observedComplete ? 'already complete' : t.lastAttemptOutcome;
    const detail = t.error ? `\t${t.error}` : '';
    return `${t.resourceId}\tpart ${t.partIndex}\t${state}${detail}`;
  });
  lines.push(
    `${report.dryRun ? 'Dry run: ' : ''}attempted ${report.attempted}, succeeded ${report.succeeded}, failed ${report.failed}, already complete ${report.alreadyComplete}`,
  );
  if (report.cancelled) {
    lines.push('Run cancelled');
  }
  if (report.sessionStale) {
    lines.push('Session is stale; capture fresh authenticated traffic and retry');
  }
  return lines;
}

// ============================================================
// プログラム
// ============================================================

/**
 * Build the CLI. Each invocation opens at most one database, released by
 * `runCli` when the command finishes.
 */
export function buildProgram(deps: CliDeps, opened: Database.Database[] = []): Command {
  const out = (line: string): void => deps.stdout(line);

  function open(cmd: Command): AppContext {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const config = deps.loadConfig(opts.config);
    if (opts.db) {
      config.database.path = opts.db;
    }
    if (opts.scope !== undefined) {
      config.scope.hosts = opts.scope
        .split(',')
        .map((h) => h.trim().toLowerCase())
        .filter((h) => h.length > 0);
    }
    const logger = deps.logger ?? createLogger(config.logging);
    const db = deps.openDatabase(config.database.path);
    opened.push(db);
    return createContext(db, config, logger);
  }

  function runner(ctx: AppContext): AutomationRunner {
    const profile = ctx.config.automation;
    if (profile === undefined) {
      throw new UsageError('No automation profile configured (set "automation" in the config file)');
    }
    return new AutomationRunner(ctx.query, profile, {
      client: deps.httpClient,
      logger: ctx.logger,
      sleep: deps.sleep,
    });
  }

  async function runAutomation(
    cmd: Command,
    opts: { dryRun?: boolean; delay?: number },
    resourceIds?: string[],
  ): Promise<void> {
    const ctx = open(cmd);
    const report = await runner(ctx).run({
      dryRun: opts.dryRun ?? false,
      delaySeconds: opts.delay,
      signal: deps.signal,
      resourceIds,
    });
    formatRun(report).forEach(out);
    if (report.haltedBy) {
      throw report.haltedBy;
    }
  }

  const program = new Command();
  program
    .name('tapdeck')
    .description('Query, analyze, export and replay captured HTTP(S) traffic')
    .version('0.1.0')
    .option('--db <path>', 'SQLite store path (overrides config)')
    .addOption(
      new Option('--config <path>', 'config file')
        .env('TAPDECK_CONFIG')
        .default('tapdeck.config.json'),
    )
    .option('--scope <hosts>', 'comma-separated host suffixes restricting every read')
    .exitOverride()
    .configureOutput({
      writeOut: (s) => deps.stdout(s.replace(/\n$/, '')),
      writeErr: (s) => deps.stderr(s.replace(/\n$/, '')),
    });

  program
    .command('stats')
    .description('Traffic statistics')
    .action((_opts: object, cmd: Command) => {
      formatStats(open(cmd).query.aggregate()).forEach(out);
    });

  program
    .command('list')
    .description('Most recent transactions')
    .option('--host <host>', 'host or parent domain')
    .option('--limit <n>', 'maximum rows', positiveInt, 50)
    .action((opts: { host?: string; limit: number }, cmd: Command) => {
      const ctx = open(cmd);
      for (const tx of ctx.query.find({ hostSuffix: opts.host, limit: opts.limit })) {
        out(formatRow(tx));
      }
    });

  program
    .command('show')
    .description('Full detail of one transaction')
    .argument('<id>', 'transaction id')
    .action((id: string, _opts: object, cmd: Command) => {
      out(JSON.stringify(open(cmd).query.get(parseId(id)), null, 2));
    });

  program
    .command('analyze')
    .description('Heuristic analysis of one transaction (--id) or of recent traffic')
    .option('--id <id>', 'transaction id', positiveInt)
    .option('--limit <n>', 'recent transactions to analyze', positiveInt, 100)
    .action((opts: { id?: number; limit: number }, cmd: Command) => {
      const ctx = open(cmd);
      if (opts.id === undefined) {
        formatSession(ctx.analyzer.analyzeSession(opts.limit)).forEach(out);
        return;
      }
      const result = ctx.analyzer.analyzeAndRecord(opts.id);
      if (result.findings.length === 0) {
        out(`#${opts.id}: no findings`);
      }
      for (const f of result.findings) {
        out(`[${f.severity}] ${f.category} ${f.rule}: ${f.message}`);
      }
      for (const s of result.skipped) {
        out(`skipped ${s.rule}: ${s.reason}`);
      }
    });

  program
    .command('search')
    .description('Substring search over URLs, headers and bodies')
    .argument('<query>', 'text to search for')
    .option('--limit <n>', 'maximum rows', positiveInt, 50)
    .action((query: string, opts: { limit: number }, cmd: Command) => {
      for (const tx of open(cmd).query.find({ text: query, limit: opts.limit })) {
        out(formatRow(tx));
      }
    });

  program
    .command('export')
    .description('Export transactions to a JSON or HAR file')
    .argument('<path>', 'output file')
    .option('--host <host>', 'host or parent domain')
    .option('--limit <n>', 'maximum transactions', positiveInt)
    .addOption(new Option('--format <format>', 'output format').choices(EXPORT_FORMATS).default('json'))
    .action(
      async (
        filePath: string,
        opts: { host?: string; limit?: number; format: ExportFormat },
        cmd: Command,
      ) => {
        const ctx = open(cmd);
        const rows = ctx.query.find({ hostSuffix: opts.host, limit: opts.limit });
        const count = await exportToFile(filePath, rows, opts.format);
        out(`Exported ${count} transactions to ${filePath} (${opts.format})`);
      },
    );

  program
    .command('clear')
    .description('Delete every stored transaction')
    .option('--yes', 'confirm deletion')
    .action((opts: { yes?: boolean }, cmd: Command) => {
      if (!opts.yes) {
        throw new UsageError('Refusing to clear the store without --yes');
      }
      out(`Removed ${open(cmd).transactions.clear()} transactions`);
    });

  program
    .command('summary')
    .description('Automation targets and their completion state')
    .action((_opts: object, cmd: Command) => {
      const { targets } = runner(open(cmd)).scan();
      for (const t of targets) {
        out(
          `${t.resourceId}\tpart ${t.partIndex}\t${t.observedComplete ? 'complete' : 'incomplete'}\t${t.url ?? '-'}`,
        );
      }
      const summary = summarizeTargets(targets);
      out(`Total: ${summary.total} | Complete: ${summary.complete} | Incomplete: ${summary.incomplete}`);
    });

  program
    .command('auth')
    .description('Show the session derived from captured traffic')
    .action((_opts: object, cmd: Command) => {
      const ctx = open(cmd);
      const { session } = runner(ctx).scan();
      if (session === undefined) {
        throw new NoSessionFoundError(ctx.config.automation?.host ?? 'the configured host');
      }
      out(`Bearer: ${session.bearerCredential.slice(0, CREDENTIAL_PREFIX)}…`);
      out(`Scope: ${session.scopeIdentifier ?? '-'}`);
      out(`Derived from: #${session.derivedFromTransactionId}`);
    });

  program
    .command('auto')
    .description('Complete every incomplete automation target')
    .option('--dry-run', 'show what would be sent without sending')
    .option('--delay <seconds>', 'delay between requests', nonNegativeNumber)
    .action((opts: { dryRun?: boolean; delay?: number }, cmd: Command) =>
      runAutomation(cmd, opts),
    );

  program
    .command('complete')
    .description('Complete specific resources by id')
    .argument('<ids...>', 'resource ids')
    .option('--dry-run', 'show what would be sent without sending')
    .option('--delay <seconds>', 'delay between requests', nonNegativeNumber)
    .action((ids: string[], opts: { dryRun?: boolean; delay?: number }, cmd: Command) =>
      runAutomation(cmd, opts, ids),
    );

  program
    .command('ingest')
    .description('Import captured traffic (NDJSON feed, JSON export or HAR)')
    .argument('<path>', 'input file')
    .addOption(new Option('--format <format>', 'input format').choices(INGEST_FORMATS).default('ndjson'))
    .action(async (filePath: string, opts: { format: IngestFormat }, cmd: Command) => {
      const ctx = open(cmd);
      const summary = await ingestFile(ctx.transactions, filePath, opts.format, ctx.logger);
      out(`Ingested ${summary.ingested} transactions (${summary.invalid} invalid)`);
    });

  program
    .command('notes')
    .description('Set the free-text note of a transaction')
    .argument('<id>', 'transaction id')
    .argument('<text>', 'note text')
    .action((id: string, text: string, _opts: object, cmd: Command) => {
      const ctx = open(cmd);
      const txId = ctx.query.get(parseId(id)).id;
      ctx.transactions.updateNotes(txId, text);
      out(`Updated notes for #${txId}`);
    });

  program
    .command('replay')
    .description('Re-send a stored transaction with optional overrides')
    .argument('<id>', 'transaction id')
    .option('--url <url>', 'override the URL')
    .option('--header <name:value>', 'override or add a header (repeatable)', collect, [])
    .option('--body <body>', 'override the request body')
    .option('--store', 'store the replay as a new transaction')
    .action(
      async (
        id: string,
        opts: { url?: string; header: string[]; body?: string; store?: boolean },
        cmd: Command,
      ) => {
        const ctx = open(cmd);
        const engine = new ReplayEngine(ctx.query, {
          client: deps.httpClient,
          timeoutMs: ctx.config.replay.timeoutMs,
          logger: ctx.logger,
        });
        const result = await engine.replay(parseId(id), {
          url: opts.url,
          headers: parseHeaderArgs(opts.header),
          body: opts.body,
        });
        out(`Status: ${result.status}`);
        out(`Duration: ${result.duration.toFixed(3)}s`);
        out(`Body (${result.responseSummary.bodySize} bytes): ${result.responseSummary.bodyPreview}`);
        if (opts.store) {
          out(`Stored as #${ctx.transactions.append(toCaptureInput(result)).id}`);
        }
      },
    );

  return program;
}

/**
 * Run one CLI invocation and return its exit code. Errors are reported on
 * stderr, never thrown.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const opened: Database.Database[] = [];
  const program = buildProgram(deps, opened);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return EXIT_OK;
  } catch (error) {
    const code = exitCodeFor(error);
    if (!(error instanceof CommanderError)) {
      const name = error instanceof TapdeckError ? error.code : 'ERROR';
      deps.stderr(`${name}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return code;
  } finally {
    for (const db of opened) {
      deps.releaseDatabase?.(db);
    }
  }
}
