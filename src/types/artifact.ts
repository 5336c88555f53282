/**
 * A binary file to be linked to a bibliographic record.
 * Only its name is interpreted.
 */
export interface Artifact {
    /** Stable reference used in assignments (usually the file path) */
    ref: string;

    /** File name including extension */
    filename: string;
}

/**
 * Strategy that produced a match candidate.
 */
export type MatchStrategy =
    | 'sequential_position'
    | 'identifier'
    | 'leading_title_words'
    | 'any_title_words'
    | 'author_year';

/**
 * One scored link between an artifact and a record.
 */
export interface MatchCandidate {
    recordId: number;
    artifactRef: string;
    strategy: MatchStrategy;
    /** Human-readable detail, e.g. `first_words(3/5)` */
    detail: string;
    /** 0–100 */
    confidence: number;
}

/**
 * Final link between a record and an artifact.
 */
export interface Assignment {
    recordId: number;
    artifactRef: string;
    confidence: number;
    strategy: MatchStrategy | 'previous';
}

export type ConflictReason = 'tie' | 'outranked' | 'previously-assigned';

/**
 * Two or more artifacts competing for one record, surfaced for manual choice.
 */
export interface MatchConflict {
    recordId: number;
    reason: ConflictReason;
    /** Assignment that holds the record, if any */
    holder: Assignment | null;
    /** Candidates that were not auto-assigned */
    contenders: MatchCandidate[];
}

export type ArtifactStatus = 'assigned' | 'conflicted' | 'low-confidence' | 'unmatched' | 'already-assigned';

/**
 * Per-artifact classification.
 */
export interface ArtifactOutcome {
    artifact: Artifact;
    status: ArtifactStatus;
    best: MatchCandidate | null;
}

/**
 * Complete classification returned by `matchArtifacts`.
 */
export interface MatchReport {
    /** recordId → assignment, previous assignments included */
    assignments: Map<number, Assignment>;
    /** Best candidates that fell below the acceptance threshold */
    lowConfidence: MatchCandidate[];
    /** Artifacts with no candidate at or above the acceptance threshold */
    unmatched: Artifact[];
    conflicts: MatchConflict[];
    outcomes: ArtifactOutcome[];
}
