import { describe, it, expect } from 'vitest';
import { buildAnalytics } from '../../../src/reports/assessment-analytics';
import { ASSESSMENT_TAXONOMY } from '../../../src/taxonomy/assessment-taxonomy';

describe('buildAnalytics', () => {
    const result = globalThis.testUtils.generateMockResult();

    it('should rank the best and weakest categories', () => {
        const analytics = buildAnalytics(result, ASSESSMENT_TAXONOMY);

        expect(analytics.topCategories.map(category => category.id))
            .toEqual(['technical_skills', 'communication_skills', 'decision_making']);
        expect(analytics.attentionCategories.map(category => category.id))
            .toEqual(['decision_making', 'communication_skills', 'technical_skills']);
    });

    it('should compute each category contribution', () => {
        const { contributions } = buildAnalytics(result, ASSESSMENT_TAXONOMY);

        expect(contributions.map(entry => [entry.id, entry.weight])).toEqual([
            ['technical_skills', 0.3],
            ['communication_skills', 0.2],
            ['decision_making', 0.05]
        ]);
        expect(contributions[0].contribution).toBeCloseTo(24, 9);
        expect(contributions[1].contribution).toBeCloseTo(14, 9);
        expect(contributions[2].contribution).toBeCloseTo(2.5, 9);
    });

    it('should recommend improvements ordered by impact', () => {
        const { recommendations } = buildAnalytics(result, ASSESSMENT_TAXONOMY);

        expect(recommendations).toHaveLength(2);
        expect(recommendations[0]).toMatchObject({
            category: 'Communication Skills',
            score: 70,
            priority: 'Medium',
            suggestion: 'Enhance communication skills to reach the next performance level.'
        });
        expect(recommendations[0].impact).toBeCloseTo(1, 9);
        expect(recommendations[1]).toMatchObject({
            category: 'Decision-Making Ability',
            score: 50,
            priority: 'Medium',
            suggestion: 'Focus on improving decision-making ability as it significantly impacts the overall assessment.'
        });
        expect(recommendations[1].impact).toBeCloseTo(0.5, 9);
    });

    it('should flag heavily weighted low scores as high priority', () => {
        const weak = {
            ...result,
            categories: {
                technical_skills: { score: 30, observations: [], assessment: 'Struggled with fundamentals.' }
            }
        };

        const { recommendations } = buildAnalytics(weak, ASSESSMENT_TAXONOMY);

        expect(recommendations).toHaveLength(1);
        expect(recommendations[0].priority).toBe('High');
        expect(recommendations[0].impact).toBeCloseTo(9, 9);
    });

    it('should report both the weighted and the reported score', () => {
        const analytics = buildAnalytics(result, ASSESSMENT_TAXONOMY);

        // (80 * 0.3 + 70 * 0.2 + 50 * 0.05) / 0.55
        expect(analytics.weightedScore).toBeCloseTo(73.636, 3);
        expect(analytics.reportedScore).toBe(72);
    });
});
