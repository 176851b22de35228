import { describe, it, expect } from 'vitest';
import {
    exportFileName,
    formatReportDate,
    renderExport,
    toCsvExport,
    toJsonExport,
    toTextReport
} from '../../../src/reports/report-exporter';
import { ASSESSMENT_TAXONOMY } from '../../../src/taxonomy/assessment-taxonomy';

describe('Report exporter', () => {
    const result = globalThis.testUtils.generateMockResult();
    const date = new Date('2026-10-05T08:09:10.000Z');

    it('should export the full result as indented JSON', () => {
        const json = toJsonExport(result);

        expect(JSON.parse(json)).toEqual(result);
        expect(json.split('\n')[1]).toBe('  "summary": "Clear communicator with solid backend fundamentals.",');
    });

    it('should export one CSV row per category with quoting', () => {
        expect(toCsvExport(result, ASSESSMENT_TAXONOMY)).toBe([
            'Category,Score,Assessment',
            'Technical Skills,80,Strong grasp of core backend concepts.',
            'Communication Skills,70,"Generally clear, sometimes verbose."',
            'Decision-Making Ability,50,Needs more practice weighing options.',
            ''
        ].join('\n'));
    });

    it('should escape embedded quotes in CSV fields', () => {
        const quoted = {
            ...result,
            categories: {
                cultural_fit: { score: 65, observations: [], assessment: 'Said "team first" twice' }
            }
        };

        expect(toCsvExport(quoted, ASSESSMENT_TAXONOMY).split('\n')[1])
            .toBe('Cultural Fit & Attitude,65,"Said ""team first"" twice"');
    });

    it('should format report dates in UTC', () => {
        expect(formatReportDate(date)).toBe('October 05, 2026');
    });

    it('should render the text report', () => {
        expect(toTextReport(result, ASSESSMENT_TAXONOMY, date)).toBe([
            'INTERVIEW ASSESSMENT REPORT',
            '==========================',
            '',
            'Candidate: Jane Doe',
            'Position: Backend Engineer',
            'Experience Level: Mid Level (3-5 years)',
            'Date: October 05, 2026',
            'Final Score: 72/100',
            '',
            'SUMMARY',
            '-------',
            'Clear communicator with solid backend fundamentals.',
            '',
            'ROLE FIT',
            '--------',
            'Rating: Moderate',
            'Good fit with some gaps.',
            '',
            'KEY STRENGTHS',
            '-------------',
            '• System design',
            '• Structured answers',
            '',
            'AREAS FOR IMPROVEMENT',
            '--------------------',
            '• Decisiveness',
            '• Conciseness',
            '',
            'CATEGORY SCORES',
            '---------------',
            'Technical Skills: 80/100',
            'Communication Skills: 70/100',
            'Decision-Making Ability: 50/100',
            ''
        ].join('\n'));
    });

    it('should show a placeholder when the candidate is unnamed', () => {
        const anonymous = { ...result, metadata: { ...result.metadata, candidate_name: '' } };

        expect(toTextReport(anonymous, ASSESSMENT_TAXONOMY, date).split('\n')[3]).toBe('Candidate: Not specified');
    });

    describe('exportFileName', () => {
        it('should include the sanitized candidate name and a UTC timestamp', () => {
            expect(exportFileName('csv', 'Jane Doe', date)).toBe('interview_scores_Jane_Doe_20261005_080910.csv');
            expect(exportFileName('json', 'Jane Doe', date)).toBe('interview_assessment_Jane_Doe_20261005_080910.json');
            expect(exportFileName('txt', 'Jane Doe', date)).toBe('interview_summary_Jane_Doe_20261005_080910.txt');
        });

        it('should fall back to "candidate" without a name', () => {
            expect(exportFileName('txt', '  ', date)).toBe('interview_summary_candidate_20261005_080910.txt');
        });
    });

    it('should dispatch renderExport by format', () => {
        expect(renderExport('json', result, ASSESSMENT_TAXONOMY, date)).toBe(toJsonExport(result));
        expect(renderExport('csv', result, ASSESSMENT_TAXONOMY, date)).toBe(toCsvExport(result, ASSESSMENT_TAXONOMY));
        expect(renderExport('txt', result, ASSESSMENT_TAXONOMY, date)).toBe(toTextReport(result, ASSESSMENT_TAXONOMY, date));
    });
});
