import Database from 'better-sqlite3';
import { z } from 'zod';
import type { Assignment, Corpus, CorpusRecord } from '../types/index.js';
import type { RunStatistics, RunStatisticsSnapshot } from '../search/statistics.js';
import { getLogger } from '../utils/logger.js';

/** Status of a record's full text. */
export type FullTextStatus = 'Awaiting' | 'Acquired';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one search session
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  keywords_json TEXT NOT NULL DEFAULT '[]',
  question TEXT,
  sources_json TEXT NOT NULL DEFAULT '[]',
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Records: the deduplicated corpus of a run
CREATE TABLE IF NOT EXISTS records (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  record_id INTEGER NOT NULL,
  title TEXT NOT NULL,
  authors TEXT NOT NULL,
  abstract TEXT NOT NULL DEFAULT '',
  year INTEGER,
  url TEXT NOT NULL DEFAULT '',
  doi TEXT,
  source_name TEXT NOT NULL,
  method_tag TEXT NOT NULL,
  search_terms_json TEXT NOT NULL DEFAULT '[]',
  full_text_status TEXT NOT NULL DEFAULT 'Awaiting',
  artifact_ref TEXT,
  match_confidence REAL,
  match_strategy TEXT,
  PRIMARY KEY (run_id, record_id)
);

CREATE INDEX IF NOT EXISTS idx_records_artifact ON records(run_id, artifact_ref);
`;

interface RunRow {
    run_id: number;
    created_at: string;
    keywords_json: string;
    question: string | null;
    sources_json: string;
    stats_json: string;
}

interface RecordRow {
    run_id: number;
    record_id: number;
    title: string;
    authors: string;
    abstract: string;
    year: number | null;
    url: string;
    doi: string | null;
    source_name: string;
    method_tag: string;
    search_terms_json: string;
    full_text_status: string;
    artifact_ref: string | null;
    match_confidence: number | null;
    match_strategy: string | null;
}

const StringListSchema = z.array(z.string());

const SourceOutcomeSchema = z.object({
    source: z.string(),
    method: z.string(),
    outcome: z.enum(['success', 'failure']),
    recordCount: z.number(),
    reason: z
        .enum(['network', 'http-status', 'parse', 'no-results', 'missing-api-key', 'timeout', 'no-terms'])
        .optional(),
    message: z.string().optional(),
});

const StatisticsSnapshotSchema = z.object({
    successful: z.array(SourceOutcomeSchema),
    failed: z.array(SourceOutcomeSchema),
    successRate: z.number(),
});

/**
 * A stored search run.
 */
export interface StoredRun {
    runId: number;
    createdAt: string;
    keywords: string[];
    question: string | null;
    sources: string[];
    statistics: RunStatisticsSnapshot;
}

export interface SaveRunInput {
    keywords: readonly string[];
    question?: string | null;
    sources: readonly string[];
    corpus: Corpus;
    statistics: RunStatistics;
}

export interface RunStats {
    records: number;
    byStatus: Record<string, number>;
    bySource: Record<string, number>;
}

/**
 * Run and corpus storage on top of better-sqlite3.
 * Only the CLI writes here; the search and matching code never touch the file.
 */
export class CorpusDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Store a run and its corpus in one transaction.
     * Returns the new run id.
     */
    saveRun(input: SaveRunInput): number {
        const runStmt = this.db.prepare(`
      INSERT INTO runs (keywords_json, question, sources_json, stats_json)
      VALUES (@keywords_json, @question, @sources_json, @stats_json)
    `);

        const recordStmt = this.db.prepare(`
      INSERT INTO records (run_id, record_id, title, authors, abstract, year, url, doi, source_name, method_tag, search_terms_json)
      VALUES (@run_id, @record_id, @title, @authors, @abstract, @year, @url, @doi, @source_name, @method_tag, @search_terms_json)
    `);

        const insertAll = this.db.transaction((): number => {
            const result = runStmt.run({
                keywords_json: JSON.stringify(input.keywords),
                question: input.question ?? null,
                sources_json: JSON.stringify(input.sources),
                stats_json: JSON.stringify(input.statistics.toJSON()),
            });
            const runId = Number(result.lastInsertRowid);

            for (const record of input.corpus.records) {
                recordStmt.run({
                    run_id: runId,
                    record_id: record.id,
                    title: record.title,
                    authors: record.authors,
                    abstract: record.abstract,
                    year: record.year ?? null,
                    url: record.url,
                    doi: record.doi ?? null,
                    source_name: record.sourceName,
                    method_tag: record.methodTag,
                    search_terms_json: JSON.stringify(record.searchTermsUsed),
                });
            }
            return runId;
        });

        const runId = insertAll();
        getLogger().debug({ runId, records: input.corpus.records.length }, 'Run saved');
        return runId;
    }

    getRun(runId: number): StoredRun | undefined {
        const row = this.db.prepare<[number], RunRow>('SELECT * FROM runs WHERE run_id = ?').get(runId);
        if (!row) return undefined;

        return {
            runId: row.run_id,
            createdAt: row.created_at,
            keywords: StringListSchema.parse(JSON.parse(row.keywords_json)),
            question: row.question,
            sources: StringListSchema.parse(JSON.parse(row.sources_json)),
            statistics: StatisticsSnapshotSchema.parse(JSON.parse(row.stats_json)),
        };
    }

    getLatestRunId(): number | undefined {
        const row = this.db
            .prepare<[], { run_id: number }>('SELECT run_id FROM runs ORDER BY run_id DESC LIMIT 1')
            .get();
        return row?.run_id;
    }

    // ─── Records ──────────────────────────────────────────────

    /**
     * Rebuild the corpus of a run in id order.
     */
    getCorpus(runId: number): Corpus {
        const rows = this.db
            .prepare<[number], RecordRow>('SELECT * FROM records WHERE run_id = ? ORDER BY record_id')
            .all(runId);
        return { records: rows.map(toCorpusRecord) };
    }

    /**
     * recordId → artifactRef for every record that already has its full text.
     */
    getAssignments(runId: number): Map<number, string> {
        const rows = this.db
            .prepare<[number], { record_id: number; artifact_ref: string }>(
                'SELECT record_id, artifact_ref FROM records WHERE run_id = ? AND artifact_ref IS NOT NULL ORDER BY record_id'
            )
            .all(runId);
        return new Map(rows.map((row) => [row.record_id, row.artifact_ref]));
    }

    /**
     * Link artifacts to records and mark them `Acquired`.
     * Assignments carried over from earlier runs are left as stored.
     * Returns the number of records updated.
     */
    recordAssignments(runId: number, assignments: Iterable<Assignment>): number {
        const stmt = this.db.prepare(`
      UPDATE records
      SET artifact_ref = @artifact_ref, match_confidence = @confidence, match_strategy = @strategy, full_text_status = 'Acquired'
      WHERE run_id = @run_id AND record_id = @record_id AND artifact_ref IS NULL
    `);

        const updateAll = this.db.transaction((items: Assignment[]): number => {
            let changed = 0;
            for (const assignment of items) {
                if (assignment.strategy === 'previous') continue;
                changed += stmt.run({
                    run_id: runId,
                    record_id: assignment.recordId,
                    artifact_ref: assignment.artifactRef,
                    confidence: assignment.confidence,
                    strategy: assignment.strategy,
                }).changes;
            }
            return changed;
        });

        return updateAll([...assignments]);
    }

    getFullTextStatus(runId: number, recordId: number): FullTextStatus | undefined {
        const row = this.db
            .prepare<[number, number], { full_text_status: string }>(
                'SELECT full_text_status FROM records WHERE run_id = ? AND record_id = ?'
            )
            .get(runId, recordId);
        if (!row) return undefined;
        return row.full_text_status === 'Acquired' ? 'Acquired' : 'Awaiting';
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(runId: number): RunStats {
        const byStatus = countBy(
            this.db
                .prepare<[number], { key: string; count: number }>(
                    'SELECT full_text_status AS key, COUNT(*) AS count FROM records WHERE run_id = ? GROUP BY full_text_status'
                )
                .all(runId)
        );
        const bySource = countBy(
            this.db
                .prepare<[number], { key: string; count: number }>(
                    'SELECT source_name AS key, COUNT(*) AS count FROM records WHERE run_id = ? GROUP BY source_name'
                )
                .all(runId)
        );
        const records = Object.values(byStatus).reduce((sum, n) => sum + n, 0);

        return { records, byStatus, bySource };
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }
}

// ─── Private helpers ──────────────────────────────────────

function toCorpusRecord(row: RecordRow): CorpusRecord {
    const record: CorpusRecord = {
        id: row.record_id,
        title: row.title,
        authors: row.authors,
        abstract: row.abstract,
        url: row.url,
        sourceName: row.source_name,
        methodTag: row.method_tag,
        searchTermsUsed: StringListSchema.parse(JSON.parse(row.search_terms_json)),
    };
    if (row.year !== null) record.year = row.year;
    if (row.doi !== null) record.doi = row.doi;
    return record;
}

function countBy(rows: ReadonlyArray<{ key: string; count: number }>): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const row of rows) {
        counts[row.key] = row.count;
    }
    return counts;
}
