/**
 * File name helpers for artifact matching.
 */

const LEADING_INTEGER = /^(\d+)[_\-\s.]/;

/**
 * Lowercased file name without its final extension.
 * "3_Some Study.PDF" → "3_some study"; ".hidden" keeps its leading dot.
 */
export function fileStem(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? filename;
    const dot = base.lastIndexOf('.');
    const stem = dot > 0 ? base.slice(0, dot) : base;
    return stem.trim().toLowerCase();
}

/**
 * Integer a file name starts with, when a separator follows it.
 * "07_review.pdf" → 7, "2020study.pdf" → undefined
 */
export function leadingInteger(filename: string): number | undefined {
    const base = filename.split(/[\\/]/).pop() ?? filename;
    const match = base.match(LEADING_INTEGER);
    return match?.[1] ? parseInt(match[1], 10) : undefined;
}

/**
 * Whether `id` occurs in the stem as a whole number, not as part of a longer one.
 * "smith_12_notes" contains 12 but not 1 or 2.
 */
export function containsNumber(stem: string, id: number): boolean {
    return new RegExp(`(^|[^0-9])${id}([^0-9]|$)`).test(stem);
}
