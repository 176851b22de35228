import { AssessmentTaxonomy, categoryName } from '../taxonomy/assessment-taxonomy';
import { AssessmentResult } from '../types/assessment';
import { sanitizeFilename } from '../utils/media.util';

export type ExportFormat = 'json' | 'csv' | 'txt';

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
    json: 'application/json',
    csv: 'text/csv',
    txt: 'text/plain'
};

const EXPORT_FILE_PREFIXES: Record<ExportFormat, string> = {
    json: 'interview_assessment',
    csv: 'interview_scores',
    txt: 'interview_summary'
};

const MONTHS = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
];

const pad = (value: number): string => String(value).padStart(2, '0');

export function toJsonExport(result: AssessmentResult): string {
    return JSON.stringify(result, null, 2);
}

function csvField(value: string | number): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * One row per assessed category, in the order the model returned them.
 */
export function toCsvExport(result: AssessmentResult, taxonomy: AssessmentTaxonomy): string {
    const rows = [['Category', 'Score', 'Assessment'].join(',')];
    for (const [id, category] of Object.entries(result.categories)) {
        rows.push([
            csvField(categoryName(taxonomy, id)),
            csvField(category.score),
            csvField(category.assessment)
        ].join(','));
    }
    return rows.join('\n') + '\n';
}

export function formatReportDate(date: Date): string {
    return `${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()}`;
}

export function toTextReport(result: AssessmentResult, taxonomy: AssessmentTaxonomy, date: Date): string {
    const { metadata } = result;
    const bullets = (items: string[]) => items.map(item => `• ${item}`);

    return [
        'INTERVIEW ASSESSMENT REPORT',
        '==========================',
        '',
        `Candidate: ${metadata.candidate_name || 'Not specified'}`,
        `Position: ${metadata.job_role}`,
        `Experience Level: ${metadata.experience_level}`,
        `Date: ${formatReportDate(date)}`,
        `Final Score: ${result.final_score}/100`,
        '',
        'SUMMARY',
        '-------',
        result.summary,
        '',
        'ROLE FIT',
        '--------',
        `Rating: ${result.role_fit.rating}`,
        result.role_fit.justification,
        '',
        'KEY STRENGTHS',
        '-------------',
        ...bullets(result.strengths),
        '',
        'AREAS FOR IMPROVEMENT',
        '--------------------',
        ...bullets(result.improvements),
        '',
        'CATEGORY SCORES',
        '---------------',
        ...Object.entries(result.categories).map(
            ([id, category]) => `${categoryName(taxonomy, id)}: ${category.score}/100`
        ),
        ''
    ].join('\n');
}

export function exportFileName(format: ExportFormat, candidateName: string, date: Date): string {
    const name = sanitizeFilename(candidateName.trim()) || 'candidate';
    const stamp = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
        + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
    return `${EXPORT_FILE_PREFIXES[format]}_${name}_${stamp}.${format}`;
}

export function renderExport(
    format: ExportFormat,
    result: AssessmentResult,
    taxonomy: AssessmentTaxonomy,
    date: Date
): string {
    switch (format) {
        case 'json':
            return toJsonExport(result);
        case 'csv':
            return toCsvExport(result, taxonomy);
        case 'txt':
            return toTextReport(result, taxonomy, date);
    }
}
