#!/usr/bin/env node
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { ConfigError, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createDefaultRegistry } from '../sources/registry.js';
import { search } from '../search/search.js';
import { matchArtifacts } from '../matching/artifact-matcher.js';
import { CorpusDatabase } from '../storage/database.js';
import { DEFAULT_CONFIG, type Artifact, type LitScoutConfig, type LogLevel, type MatchReport } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonOptions {
    config?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface SearchCommandOptions extends CommonOptions {
    keywords: string[];
    question?: string;
    sources?: string[];
    maxResults?: number;
    concurrency?: number;
    out?: string;
}

interface MatchCommandOptions extends CommonOptions {
    dir: string;
    run?: number;
    out?: string;
}

interface InspectCommandOptions extends CommonOptions {
    run?: number;
    out?: string;
}

const program = new Command();

program
    .name('litscout')
    .description('Search many literature sources at once, merge the results, and link downloaded full texts to them.')
    .version(VERSION);

// ─── SEARCH command ───────────────────────────────────────

withCommonOptions(
    program
        .command('search')
        .description('Run a federated search and store the corpus')
        .requiredOption('-k, --keywords <keywords...>', 'Search keywords')
        .option('-q, --question <question>', 'Research question')
        .option('-s, --sources <names...>', 'Sources to search (see `litscout sources`)')
        .option('-m, --max-results <n>', 'Maximum records per source', parsePositiveInt)
        .option('-c, --concurrency <n>', 'Sources searched at once', parsePositiveInt)
        .option('-o, --out <path>', 'Database path')
).action(async (opts: SearchCommandOptions) => {
    const flags = commonFlags(opts);
    if (opts.sources) flags.sources = opts.sources;
    if (opts.maxResults !== undefined) flags.maxResultsPerSource = opts.maxResults;
    if (opts.concurrency !== undefined) flags.concurrency = opts.concurrency;
    if (opts.out) flags.out = opts.out;

    const config = await loadConfig(flags, opts.config);
    const logger = getLogger();

    try {
        const registry = createDefaultRegistry(config);
        const { corpus, statistics } = await search(opts.keywords, opts.question, config.sources, {
            registry,
            maxResultsPerSource: config.maxResultsPerSource,
            earlyExitRatio: config.earlyExitRatio,
            concurrency: config.concurrency,
            delayRangeMs: config.delayRangeMs,
            runTimeoutMs: config.runTimeoutMs,
        });

        const db = new CorpusDatabase(config.out);
        const runId = db.saveRun({
            keywords: opts.keywords,
            question: opts.question ?? null,
            sources: config.sources,
            corpus,
            statistics,
        });
        db.close();

        console.log(`\nRun ${runId}: ${corpus.records.length} unique record(s) saved to ${config.out}\n`);
        for (const outcome of statistics.successes) {
            console.log(`  ✓ ${outcome.source} (${outcome.method}): ${outcome.recordCount}`);
        }
        for (const outcome of statistics.failures) {
            console.log(`  ✗ ${outcome.source} (${outcome.method}): ${outcome.message ?? outcome.reason ?? 'failed'}`);
        }
        console.log(`\n  Success rate: ${(statistics.successRate * 100).toFixed(0)}%\n`);
    } catch (error) {
        logger.error({ err: error }, 'Search failed');
        process.exit(1);
    }
});

// ─── MATCH command ────────────────────────────────────────

withCommonOptions(
    program
        .command('match')
        .description('Link files in a directory to the records of a stored run')
        .requiredOption('-d, --dir <path>', 'Directory holding full-text files')
        .option('-r, --run <id>', 'Run id (defaults to the latest run)', parsePositiveInt)
        .option('-o, --out <path>', 'Database path')
).action(async (opts: MatchCommandOptions) => {
    const flags = commonFlags(opts);
    if (opts.out) flags.out = opts.out;

    const config = await loadConfig(flags, opts.config);
    const logger = getLogger();

    try {
        const artifacts = await listArtifacts(opts.dir);
        const db = new CorpusDatabase(config.out);
        const runId = opts.run ?? db.getLatestRunId();
        if (runId === undefined) {
            db.close();
            console.error(`No runs stored in ${config.out}. Run \`litscout search\` first.`);
            process.exit(1);
        }

        const corpus = db.getCorpus(runId);
        const report = matchArtifacts(artifacts, corpus, db.getAssignments(runId), { config: config.matching });
        const saved = db.recordAssignments(runId, report.assignments.values());
        db.close();

        printMatchReport(runId, saved, report);
    } catch (error) {
        logger.error({ err: error }, 'Match failed');
        process.exit(1);
    }
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(
    program
        .command('inspect')
        .description('Show the records and statistics of a stored run')
        .option('-r, --run <id>', 'Run id (defaults to the latest run)', parsePositiveInt)
        .option('-o, --out <path>', 'Database path')
).action(async (opts: InspectCommandOptions) => {
    const flags = commonFlags(opts);
    if (opts.out) flags.out = opts.out;
    const config = await loadConfig(flags, opts.config);

    try {
        const db = new CorpusDatabase(config.out);
        const runId = opts.run ?? db.getLatestRunId();
        const run = runId === undefined ? undefined : db.getRun(runId);
        if (!run) {
            db.close();
            console.error(runId === undefined ? `No runs stored in ${config.out}.` : `Run ${runId} not found.`);
            process.exit(1);
        }
        const stats = db.getStats(run.runId);
        db.close();

        console.log(`\n📊 Run ${run.runId} (${run.createdAt})\n`);
        console.log(`  Keywords: ${run.keywords.join(', ') || '-'}`);
        console.log(`  Question: ${run.question ?? '-'}`);
        console.log(`  Records:  ${stats.records}`);

        console.log('\n  Full text:');
        for (const [status, count] of Object.entries(stats.byStatus)) {
            console.log(`    ${status}: ${count}`);
        }

        console.log('\n  Sources:');
        for (const outcome of [...run.statistics.successful, ...run.statistics.failed]) {
            const stored = stats.bySource[outcome.source] ?? 0;
            console.log(`    ${outcome.source} [${outcome.outcome}, ${outcome.method}]: ${outcome.recordCount} found, ${stored} kept`);
        }
        console.log(`\n  Success rate: ${(run.statistics.successRate * 100).toFixed(0)}%\n`);
    } catch (error) {
        getLogger().error({ err: error }, 'Inspect failed');
        process.exit(1);
    }
});

// ─── SOURCES command ──────────────────────────────────────

program
    .command('sources')
    .description('List the available sources')
    .action(() => {
        const registry = createDefaultRegistry(DEFAULT_CONFIG);
        const defaults = new Set(DEFAULT_CONFIG.sources);
        for (const name of registry.list()) {
            console.log(`${defaults.has(name) ? '*' : ' '} ${name}`);
        }
        console.log('\n* searched by default');
    });

await program.parseAsync(process.argv);

// ─── Private helpers ──────────────────────────────────────

function withCommonOptions(command: Command): Command {
    return command
        .option('--config <path>', 'Config file path')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
        .option('--json-logs', 'Output JSON logs');
}

function commonFlags(opts: CommonOptions): Partial<LitScoutConfig> {
    const flags: Partial<LitScoutConfig> = {};
    if (opts.logLevel) flags.logLevel = opts.logLevel;
    if (opts.jsonLogs) flags.jsonLogs = true;
    return flags;
}

async function loadConfig(flags: Partial<LitScoutConfig>, configPath?: string): Promise<LitScoutConfig> {
    try {
        const config = await resolveConfig(flags, configPath ? { configPath } : {});
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        return config;
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.format());
            process.exit(1);
        }
        throw error;
    }
}

async function listArtifacts(dir: string): Promise<Artifact[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
        .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
        .map((entry) => ({ ref: join(dir, entry.name), filename: entry.name }))
        .sort((a, b) => a.filename.localeCompare(b.filename));
}

function printMatchReport(runId: number, saved: number, report: MatchReport): void {
    console.log(`\nRun ${runId}: ${saved} new assignment(s) saved\n`);

    for (const outcome of report.outcomes) {
        if (outcome.status !== 'assigned' || !outcome.best) continue;
        const { recordId, confidence, strategy } = outcome.best;
        console.log(`  ✓ ${outcome.artifact.filename} → record ${recordId} (${confidence.toFixed(0)}%, ${strategy})`);
    }

    for (const conflict of report.conflicts) {
        const holder = conflict.holder ? `held by ${conflict.holder.artifactRef}` : 'unassigned';
        console.log(`  ! record ${conflict.recordId}: ${conflict.reason}, ${holder}`);
        for (const contender of conflict.contenders) {
            console.log(`      ${contender.artifactRef} (${contender.confidence.toFixed(0)}%, ${contender.detail})`);
        }
    }

    for (const candidate of report.lowConfidence) {
        console.log(`  ? ${candidate.artifactRef} → record ${candidate.recordId}? (${candidate.confidence.toFixed(0)}%, ${candidate.detail})`);
    }

    const noCandidate = report.outcomes.filter((o) => o.status === 'unmatched');
    for (const outcome of noCandidate) {
        console.log(`  ✗ ${outcome.artifact.filename}: no matching record`);
    }
    console.log('');
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return value;
        default:
            throw new InvalidArgumentError('Must be one of: debug, info, warn, error, silent.');
    }
}
