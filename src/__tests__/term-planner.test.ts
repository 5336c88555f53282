import { describe, it, expect } from 'vitest';
import { createKeywordCombinations, extractKeyPhrases, extractQuestionTerms, plan } from '../search/term-planner.js';

describe('Term planner', () => {
    describe('plan', () => {
        it('should return a single keyword set for a few keywords', () => {
            expect(plan(['diabetes', 'insulin'], null)).toEqual([
                { terms: ['diabetes', 'insulin'], kind: 'keywords', priority: 2, description: 'Keyword combination 1' },
            ]);
        });

        it('should fall back to generic terms when nothing is given', () => {
            expect(plan([], null)).toEqual([
                { terms: ['research', 'study', 'analysis'], kind: 'fallback', priority: 10, description: 'Basic fallback terms' },
            ]);
        });

        it('should ignore blank keywords', () => {
            expect(plan(['  ', ''], undefined)[0]?.kind).toBe('fallback');
        });

        it('should put the research question first', () => {
            const sets = plan(['insulin'], 'What is the effect of exercise on blood glucose levels in adults?');

            expect(sets.map((set) => set.kind)).toEqual(['research_question', 'keywords']);
            expect(sets[0]?.terms).toEqual(['glucose levels', 'exercise', 'blood', 'glucose', 'levels', 'adults']);
            expect(sets[0]?.priority).toBe(1);
        });

        it('should send a question with no usable terms as written', () => {
            const sets = plan([], 'What is the effect?');
            expect(sets).toHaveLength(1);
            expect(sets[0]?.terms).toEqual(['What is the effect?']);
            expect(sets[0]?.kind).toBe('research_question');
        });

        it('should order sets by ascending priority', () => {
            const priorities = plan(['a', 'b', 'c', 'd', 'e', 'f', 'g'], 'Does sleep improve memory?').map((s) => s.priority);
            expect(priorities).toEqual([...priorities].sort((x, y) => x - y));
        });
    });

    describe('extractKeyPhrases', () => {
        it('should find runs of capitalized words without a leading stop word', () => {
            expect(extractKeyPhrases('Does Machine Learning improve Deep Brain Stimulation outcomes?')).toEqual([
                'Machine Learning',
                'Deep Brain Stimulation',
            ]);
        });

        it('should find outcome phrases', () => {
            expect(extractKeyPhrases('teaching methods and cholesterol levels')).toEqual([
                'teaching methods',
                'cholesterol levels',
            ]);
        });
    });

    describe('extractQuestionTerms', () => {
        it('should deduplicate case-insensitively', () => {
            expect(extractQuestionTerms('Sleep quality and sleep duration')).toEqual(['sleep', 'quality', 'duration']);
        });

        it('should keep at most 15 terms', () => {
            const question = Array.from({ length: 30 }, (_, i) => `word${String.fromCharCode(97 + (i % 26))}${i}`).join(' ');
            expect(extractQuestionTerms(question).length).toBeLessThanOrEqual(15);
        });
    });

    describe('createKeywordCombinations', () => {
        it('should build full, first five, first three and chunk combinations', () => {
            const keywords = ['k1', 'k2', 'k3', 'k4', 'k5', 'k6', 'k7'];
            expect(createKeywordCombinations(keywords)).toEqual([
                ['k1', 'k2', 'k3', 'k4', 'k5', 'k6', 'k7'],
                ['k1', 'k2', 'k3', 'k4', 'k5'],
                ['k1', 'k2', 'k3'],
                ['k6', 'k7'],
            ]);
        });

        it('should not repeat identical combinations', () => {
            expect(createKeywordCombinations(['k1', 'k2', 'k3', 'k4'])).toEqual([
                ['k1', 'k2', 'k3', 'k4'],
                ['k1', 'k2', 'k3'],
            ]);
        });

        it('should return at most four combinations', () => {
            const keywords = Array.from({ length: 20 }, (_, i) => `k${i}`);
            expect(createKeywordCombinations(keywords)).toHaveLength(4);
        });

        it('should keep a single keyword', () => {
            expect(createKeywordCombinations(['solo'])).toEqual([['solo']]);
        });
    });
});
