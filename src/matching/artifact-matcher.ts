import {
    DEFAULT_MATCHING_CONFIG,
    type Artifact,
    type ArtifactOutcome,
    type Assignment,
    type Corpus,
    type MatchCandidate,
    type MatchConflict,
    type MatchingConfig,
    type MatchReport,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { scorePair } from './strategies.js';

/** Confidence reported for assignments carried over from an earlier run. */
export const PREVIOUS_ASSIGNMENT_CONFIDENCE = 100;

export interface MatchOptions {
    /** Overrides merged over the default thresholds */
    config?: Partial<MatchingConfig>;
}

/**
 * Score every artifact against every record and keep each artifact's best candidate.
 * Records tying for one artifact resolve to the first in corpus order.
 */
export function match(artifacts: readonly Artifact[], corpus: Corpus, config: MatchingConfig): MatchCandidate[] {
    const best: MatchCandidate[] = [];

    for (const artifact of artifacts) {
        let top: MatchCandidate | null = null;
        for (const [index, record] of corpus.records.entries()) {
            const scored = scorePair(artifact, record, index + 1, config);
            if (scored && (!top || scored.confidence > top.confidence)) top = scored;
        }
        if (top) best.push(top);
    }

    return best;
}

/**
 * Turn per-artifact best candidates into assignments, conflicts and leftovers.
 *
 * A record gets at most one artifact. When several accepted candidates want the
 * same record the strongest wins and the rest are reported as `outranked`; a
 * shared top score is a `tie` and nobody is assigned. Records that already hold
 * an artifact from `previous` are never reassigned.
 */
export function resolve(
    candidates: readonly MatchCandidate[],
    artifacts: readonly Artifact[],
    previous: ReadonlyMap<number, string>,
    config: MatchingConfig
): MatchReport {
    const assignments = new Map<number, Assignment>();
    for (const [recordId, artifactRef] of previous) {
        assignments.set(recordId, {
            recordId,
            artifactRef,
            confidence: PREVIOUS_ASSIGNMENT_CONFIDENCE,
            strategy: 'previous',
        });
    }

    const previouslyUsed = new Set(previous.values());
    const bestByRef = new Map(candidates.map((c) => [c.artifactRef, c]));
    const outcomes = new Map<string, ArtifactOutcome>();
    const lowConfidence: MatchCandidate[] = [];
    const unmatched: Artifact[] = [];
    const byRecord = new Map<number, MatchCandidate[]>();

    for (const artifact of artifacts) {
        const best = bestByRef.get(artifact.ref) ?? null;

        if (previouslyUsed.has(artifact.ref)) {
            outcomes.set(artifact.ref, { artifact, status: 'already-assigned', best });
        } else if (!best) {
            outcomes.set(artifact.ref, { artifact, status: 'unmatched', best });
            unmatched.push(artifact);
        } else if (best.confidence < config.acceptanceThreshold) {
            outcomes.set(artifact.ref, { artifact, status: 'low-confidence', best });
            lowConfidence.push(best);
            unmatched.push(artifact);
        } else {
            const group = byRecord.get(best.recordId) ?? [];
            group.push(best);
            byRecord.set(best.recordId, group);
            outcomes.set(artifact.ref, { artifact, status: 'assigned', best });
        }
    }

    const conflicts: MatchConflict[] = [];
    const markConflicted = (contenders: readonly MatchCandidate[]): void => {
        for (const contender of contenders) {
            const outcome = outcomes.get(contender.artifactRef);
            if (outcome) outcome.status = 'conflicted';
        }
    };

    for (const [recordId, group] of byRecord) {
        const ranked = [...group].sort((a, b) => b.confidence - a.confidence);

        const holder = assignments.get(recordId);
        if (holder) {
            conflicts.push({ recordId, reason: 'previously-assigned', holder, contenders: ranked });
            markConflicted(ranked);
            continue;
        }

        const [top, second] = ranked;
        if (!top) continue;

        if (second && second.confidence === top.confidence) {
            conflicts.push({ recordId, reason: 'tie', holder: null, contenders: ranked });
            markConflicted(ranked);
            continue;
        }

        const assignment: Assignment = {
            recordId,
            artifactRef: top.artifactRef,
            confidence: top.confidence,
            strategy: top.strategy,
        };
        assignments.set(recordId, assignment);

        const rest = ranked.slice(1);
        if (rest.length > 0) {
            conflicts.push({ recordId, reason: 'outranked', holder: assignment, contenders: rest });
            markConflicted(rest);
        }
    }

    return {
        assignments,
        lowConfidence,
        unmatched,
        conflicts,
        outcomes: artifacts.flatMap((artifact) => {
            const outcome = outcomes.get(artifact.ref);
            return outcome ? [outcome] : [];
        }),
    };
}

/**
 * Link artifacts to corpus records by file name.
 *
 * @param previous recordId → artifactRef links from earlier runs, kept as they are
 *
 * @example
 * const report = matchArtifacts([{ ref: 'pdfs/3_Some Study.pdf', filename: '3_Some Study.pdf' }], corpus);
 * report.assignments.get(3); // { confidence: 98, strategy: 'sequential_position', ... }
 */
export function matchArtifacts(
    artifacts: readonly Artifact[],
    corpus: Corpus,
    previous: ReadonlyMap<number, string> = new Map(),
    options: MatchOptions = {}
): MatchReport {
    const config = resolveMatchingConfig(options.config);
    const candidates = match(artifacts, corpus, config);
    const report = resolve(candidates, artifacts, previous, config);

    getLogger().info(
        {
            artifacts: artifacts.length,
            assigned: report.assignments.size - previous.size,
            conflicts: report.conflicts.length,
            lowConfidence: report.lowConfidence.length,
            unmatched: report.unmatched.length,
        },
        `Matched ${artifacts.length} artifact(s) against ${corpus.records.length} record(s)`
    );

    return report;
}

/**
 * Merge partial overrides with the default thresholds, one level deep.
 */
export function resolveMatchingConfig(overrides: Partial<MatchingConfig> = {}): MatchingConfig {
    return {
        ...DEFAULT_MATCHING_CONFIG,
        ...overrides,
        leadingWords: { ...DEFAULT_MATCHING_CONFIG.leadingWords, ...overrides.leadingWords },
        anyWords: { ...DEFAULT_MATCHING_CONFIG.anyWords, ...overrides.anyWords },
        topicalKeywords: [...(overrides.topicalKeywords ?? DEFAULT_MATCHING_CONFIG.topicalKeywords)],
    };
}
