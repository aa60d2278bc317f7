#!/usr/bin/env node

/**
 * QueryGate CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import { existsSync } from 'node:fs';
import {
  LocalStore,
  SAFE_DEFAULTS,
  SafetyValidator,
  SafetyViolation,
  SchemaGraph,
  createAdapter,
  createLogger,
  createQueryGate,
  defaultDbPath,
  loadConfigFromEnv,
  parseConnectionTarget,
  type ExecutionAdapter,
  type LogLevel,
  type QueryResponse,
} from '@querygate/core';
import { normalizeArgv } from './argv.js';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, toExitCode, usageError, runtimeError, policyError } from './errors.js';
import {
  formatTrace,
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

type DbOptions = { db?: string };

// ── Helpers ──────────────────────────────────────────────────────────

function historyDbPath(): string {
  return process.env.QUERYGATE_HISTORY_DB?.trim() || defaultDbPath();
}

function openStore(): LocalStore {
  const store = new LocalStore(historyDbPath());
  store.migrate();
  return store;
}

function resolveTarget(command: Command): string {
  const target = command.optsWithGlobals<DbOptions>().db ?? process.env.QUERYGATE_DB;
  if (!target?.trim()) {
    throw usageError('No database given. Pass --db <path|postgres-url> or set QUERYGATE_DB.', 'DB_NOT_CONFIGURED');
  }
  return target.trim();
}

function logLevelFor(output: OutputOptions, configured: LogLevel): LogLevel {
  if (output.debug) return 'debug';
  if (output.verbose) return 'info';
  return configured === 'info' ? 'warn' : configured;
}

/** Adapter and graph only; for commands that never call the reasoning backend. */
async function withSchema<T>(command: Command, fn: (graph: SchemaGraph, adapter: ExecutionAdapter) => Promise<T> | T): Promise<T> {
  const adapter = createAdapter(parseConnectionTarget(resolveTarget(command)));
  try {
    const graph = await SchemaGraph.build(adapter);
    return await fn(graph, adapter);
  } finally {
    await adapter.close();
  }
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parsePositiveInt(raw: string, name: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    throw usageError(`${name} must be a positive integer, got "${raw}".`);
  }
  return value;
}

function printResponse(response: QueryResponse, output: OutputOptions, showTrace: boolean): void {
  printHuman(response.answer, output);
  if (response.sqlUsed) {
    printHuman('', output);
    printHuman('SQL:', output);
    printHuman(`  ${response.sqlUsed}`, output);
  }
  if (response.columns.length > 0 && response.rows.length > 0) {
    printHuman('', output);
    printHumanTable(response.columns, response.rows, output);
    printHuman('', output);
    printHuman(`${response.rowCount} row${response.rowCount !== 1 ? 's' : ''}`, output);
  }
  for (const warning of response.warnings) {
    printWarning(warning, output);
  }
  if (showTrace || output.verbose) {
    printHuman('', output);
    printHuman(
      `Trace (${response.auditTrace.finalStatus}, ${response.auditTrace.totalTimeMs}ms, ${response.auditTrace.correctionAttempts} correction(s)):`,
      output,
    );
    printHuman(formatTrace(response.auditTrace.actions), output);
  }
  printHuman(`Query ID: ${response.queryId}`, output);
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('querygate')
  .description('QueryGate: natural-language questions to safe, audited SQL')
  .option('--db <target>', 'SQLite file path or postgres:// URL (defaults to QUERYGATE_DB)')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, schema
  Query:    ask, check
  History:  history
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment and configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const config = loadConfigFromEnv();
          const nodeVersion = process.version;
          const nodeOk = Number.parseInt(nodeVersion.slice(1), 10) >= 20;
          const dbPath = historyDbPath();

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            openAiKeySet: Boolean(config.reasoning.primary.apiKey),
            model: config.reasoning.primary.model,
            fallbackModel: config.reasoning.fallback?.model ?? null,
            database: process.env.QUERYGATE_DB ?? null,
            historyDb: { path: dbPath, exists: existsSync(dbPath) },
            pipeline: config.pipeline,
            execution: { statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs },
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('QueryGate Doctor', output);
          printHuman('================', output);
          printHuman('', output);
          printHuman(`Node.js:     ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`OpenAI key:  ${payload.openAiKeySet ? 'set ✓' : 'not set'}`, output);
          printHuman(`Model:       ${payload.model}${payload.fallbackModel ? ` (fallback ${payload.fallbackModel})` : ''}`, output);
          printHuman(`Database:    ${payload.database ?? 'not set (use --db or QUERYGATE_DB)'}`, output);
          printHuman(`History DB:  ${dbPath} ${payload.historyDb.exists ? '(exists)' : '(will be created)'}`, output);
          printHuman('', output);
          printHuman('Limits:', output);
          printHuman(`  Row cap:            ${config.pipeline.rowLimitCap}`, output);
          printHuman(`  Max corrections:    ${config.pipeline.maxRetries}`, output);
          printHuman(
            `  Reasoning calls:    ${config.pipeline.rateLimitCount} per ${config.pipeline.rateLimitWindowSeconds}s, ${config.pipeline.maxCallsPerQuery} per query`,
            output,
          );
          printHuman(`  Reasoning timeout:  ${config.pipeline.reasoningTimeoutMs}ms`, output);
          printHuman(`  Statement timeout:  ${SAFE_DEFAULTS.statementTimeoutMs}ms`, output);
        });
      }),
  ),
  ['querygate doctor', 'querygate doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

const schema = program.command('schema').description('Schema graph commands');

withExamples(
  withOutputFlags(
    schema
      .command('show')
      .description('List tables, columns and foreign keys')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          await withSchema(this, (graph) => {
            const snapshot = graph.snapshot;
            if (output.json) {
              printCommandSuccess({ tables: snapshot.tables, foreignKeys: snapshot.foreignKeys }, output);
              return;
            }
            printHumanTable(
              ['table', 'columns', 'rows'],
              snapshot.tables.map((t) => ({
                table: t.name,
                columns: t.columns.map((c) => `${c.name}${c.isPrimaryKey ? '*' : ''}`).join(', '),
                rows: t.rowCountEstimate ?? '-',
              })),
              output,
            );
            printHuman('', output);
            printHuman(`Foreign keys (${graph.edgeCount}):`, output);
            for (const edge of graph.allEdges()) {
              printHuman(`  ${edge.fromTable}.${edge.fromColumn} -> ${edge.toTable}.${edge.toColumn}`, output);
            }
          });
        });
      }),
  ),
  ['querygate schema show --db ./chinook.db', 'querygate schema show --json'],
);

withExamples(
  withOutputFlags(
    schema
      .command('path')
      .description('Show the foreign-key join path between two tables')
      .argument('<from>', 'First table')
      .argument('<to>', 'Second table')
      .option('--max-hops <n>', 'Longest path considered', '3')
      .action(async function (this: Command, from: string, to: string) {
        await runCommand(this, async (output) => {
          const maxHops = parsePositiveInt(this.opts<{ maxHops: string }>().maxHops, '--max-hops');
          await withSchema(this, (graph) => {
            const path = graph.shortestPath(from, to, maxHops);
            const suggestion = graph.suggestJoinPath(from, to, maxHops);
            if (output.json) {
              printCommandSuccess({ path, suggestion }, output);
              return;
            }
            printHuman(suggestion, output);
          });
        });
      }),
  ),
  ['querygate schema path Artist Track', 'querygate schema path Customer Employee --max-hops 2'],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check')
      .description('Run the safety validator on a SQL statement without executing it')
      .requiredOption('--sql <sql>', 'SQL statement to check')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const sql = this.opts<{ sql: string }>().sql;
          const config = loadConfigFromEnv();
          await withSchema(this, (graph, adapter) => {
            const validator = new SafetyValidator(
              graph,
              {
                forbiddenKeywords: config.pipeline.forbiddenKeywords,
                rowLimitCap: config.pipeline.rowLimitCap,
                maxJoinHops: config.pipeline.maxJoinHops,
              },
              adapter.dialect,
            );
            const result = validator.validate(sql);
            for (const warning of result.warnings) {
              printWarning(warning, output);
            }
            const [first] = result.violations;
            if (first) {
              const message = result.violations
                .map((v) => `[${v.rule}] ${v.reason}${v.suggestedFix ? `\n  Fix: ${v.suggestedFix}` : ''}`)
                .join('\n');
              throw new SafetyViolation(first.rule, message, first.suggestedFix);
            }
            printCommandSuccess(result, output, 'Approved: the statement passes every safety rule.');
          });
        });
      }),
  ),
  [
    'querygate check --sql "SELECT Name FROM Artist LIMIT 10"',
    'querygate check --sql "SELECT * FROM Track" --json',
  ],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Answer a natural-language question: classify, generate SQL, check, execute and explain')
      .argument('<question>', 'Natural language question')
      .option('--trace', 'Print the audit trace', false)
      .option('--no-history', 'Do not record the query in local history')
      .action(async function (this: Command, question: string) {
        await runCommand(this, async (output) => {
          const opts = this.opts<{ trace: boolean; history: boolean }>();
          const config = loadConfigFromEnv();
          const logger = createLogger({ level: logLevelFor(output, config.logLevel), stream: 'stderr' });
          const store = opts.history ? openStore() : undefined;
          try {
            const gate = await createQueryGate({ target: resolveTarget(this), config, logger, history: store });
            let response: QueryResponse;
            try {
              response = await gate.ask(question);
            } finally {
              await gate.close();
            }

            if (output.json && response.success) {
              printCommandSuccess(response, output);
              return;
            }
            if (!output.json) {
              printResponse(response, output, opts.trace);
            }
            if (response.auditTrace.finalStatus === 'BLOCKED') {
              throw policyError(response.answer, 'QUERY_BLOCKED', response);
            }
            if (response.auditTrace.finalStatus === 'ERROR') {
              throw runtimeError(response.answer, 'QUERY_FAILED', response);
            }
          } finally {
            store?.close();
          }
        });
      }),
  ),
  [
    'querygate ask "How many customers are from Brazil?" --db ./chinook.db',
    'querygate ask "top 5 artists by track count" --trace',
    'querygate ask "which tables exist?" --json',
  ],
);

// ── history ─────────────────────────────────────────────────────────

const history = program.command('history').description('Query history');

withExamples(
  withOutputFlags(
    history
      .command('list')
      .description('List recent queries')
      .option('--limit <n>', 'Number of items', '20')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const limit = parsePositiveInt(this.opts<{ limit: string }>().limit, '--limit');
          const store = openStore();
          try {
            const items = store.listHistory(limit);

            if (output.json) {
              printCommandSuccess(items, output);
              return;
            }
            if (items.length === 0) {
              printHuman('No queries in history. Use "querygate ask" to ask a question.', output);
              return;
            }
            printHumanTable(
              ['id', 'question', 'asked_at', 'status', 'total_ms', 'row_count'],
              items.map((item) => ({
                id: item.id.slice(0, 8) + '...',
                question: item.question.length > 50 ? item.question.slice(0, 47) + '...' : item.question,
                asked_at: item.askedAt,
                status: item.status,
                total_ms: item.totalTimeMs,
                row_count: item.rowCount,
              })),
              output,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['querygate history list --limit 20', 'querygate history list --json'],
);

withExamples(
  withOutputFlags(
    history
      .command('show <id>')
      .description('Show the answer, SQL and audit trace of a past query')
      .action(async function (this: Command, id: string) {
        await runCommand(this, async (output) => {
          const store = openStore();
          try {
            const fullId =
              id.length < 36 ? store.listHistory(1000).find((item) => item.id.startsWith(id))?.id ?? id : id;
            const detail = store.getHistoryItem(fullId);
            if (!detail) throw usageError(`Query "${id}" not found.`, 'HISTORY_NOT_FOUND');

            if (output.json) {
              printCommandSuccess(detail, output);
              return;
            }
            printHuman(`Query ID:     ${detail.id}`, output);
            printHuman(`Question:     ${detail.question}`, output);
            printHuman(`Asked at:     ${detail.askedAt}`, output);
            printHuman(`Status:       ${detail.status}`, output);
            printHuman(`SQL:          ${detail.sql ?? '-'}`, output);
            printHuman(`Rows:         ${detail.rowCount}`, output);
            printHuman(`Corrections:  ${detail.correctionAttempts}`, output);
            printHuman(`Total time:   ${detail.totalTimeMs}ms`, output);
            printHuman('', output);
            printHuman(detail.answer, output);
            for (const warning of detail.warnings) {
              printWarning(warning, output);
            }
            printHuman('\nTrace:', output);
            printHuman(formatTrace(detail.trace), output);
            printHuman('\nNote: Result rows are not stored in history.', output);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['querygate history show <query-id>', 'querygate history show <query-id-prefix> --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
