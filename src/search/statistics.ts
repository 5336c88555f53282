import type { AdapterFailureReason } from '../types/index.js';

/**
 * One source's outcome within a run. `method` is `<technique>_<term set kind>`
 * for successes and the last technique tried for failures.
 */
export interface SourceOutcome {
    source: string;
    method: string;
    outcome: 'success' | 'failure';
    recordCount: number;
    reason?: AdapterFailureReason;
    message?: string;
}

/**
 * Plain-data form of RunStatistics, for logging and persistence.
 */
export interface RunStatisticsSnapshot {
    successful: SourceOutcome[];
    failed: SourceOutcome[];
    successRate: number;
}

/**
 * Per-run record of which sources succeeded and by which method.
 * Each source is recorded exactly once per run, as a success or a failure.
 */
export class RunStatistics {
    private readonly outcomes: SourceOutcome[] = [];
    private readonly recorded = new Set<string>();
    /** Aggregates of several runs hold one outcome per source per run */
    private aggregate = false;

    recordSuccess(source: string, method: string, recordCount: number): void {
        this.add({ source, method, outcome: 'success', recordCount });
    }

    recordFailure(source: string, method: string, failure?: { reason: AdapterFailureReason; message: string }): void {
        const outcome: SourceOutcome = { source, method, outcome: 'failure', recordCount: 0 };
        if (failure) {
            outcome.reason = failure.reason;
            outcome.message = failure.message;
        }
        this.add(outcome);
    }

    get successes(): SourceOutcome[] {
        return this.outcomes.filter((o) => o.outcome === 'success');
    }

    get failures(): SourceOutcome[] {
        return this.outcomes.filter((o) => o.outcome === 'failure');
    }

    /** `source:method` strings, in the order recorded */
    get successfulMethods(): string[] {
        return this.successes.map((o) => `${o.source}:${o.method}`);
    }

    get failedMethods(): string[] {
        return this.failures.map((o) => `${o.source}:${o.method}`);
    }

    /** successes / (successes + failures); 0 for an empty run */
    get successRate(): number {
        return this.successes.length / Math.max(1, this.outcomes.length);
    }

    get totalRecords(): number {
        return this.outcomes.reduce((sum, o) => sum + o.recordCount, 0);
    }

    has(source: string): boolean {
        return this.recorded.has(source);
    }

    toJSON(): RunStatisticsSnapshot {
        return {
            successful: this.successes.map((o) => ({ ...o })),
            failed: this.failures.map((o) => ({ ...o })),
            successRate: this.successRate,
        };
    }

    /**
     * Aggregate several runs. The same source may appear once per merged run.
     */
    static merge(...runs: RunStatistics[]): RunStatistics {
        const merged = new RunStatistics();
        merged.aggregate = true;
        for (const run of runs) {
            for (const outcome of run.outcomes) {
                merged.add({ ...outcome });
            }
        }
        return merged;
    }

    /**
     * Rebuild statistics stored with `toJSON()`, merged ones included.
     */
    static fromSnapshot(snapshot: RunStatisticsSnapshot): RunStatistics {
        const stats = new RunStatistics();
        const outcomes = [...snapshot.successful, ...snapshot.failed];
        stats.aggregate = new Set(outcomes.map((o) => o.source)).size < outcomes.length;
        for (const outcome of outcomes) {
            stats.add({ ...outcome });
        }
        return stats;
    }

    private add(outcome: SourceOutcome): void {
        if (!this.aggregate && this.recorded.has(outcome.source)) {
            throw new Error(`Outcome already recorded for source "${outcome.source}" in this run`);
        }
        this.recorded.add(outcome.source);
        this.outcomes.push(outcome);
    }
}
