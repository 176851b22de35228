import { AssessmentTaxonomy, taxonomyToRecord } from '../taxonomy/assessment-taxonomy';

export type PromptSource =
    | { kind: 'transcript'; transcript: string }
    | { kind: 'video'; reference: string };

export interface AssessmentPromptInput {
    source: PromptSource;
    jobRole: string;
    experienceLevel: string;
    candidateName?: string;
    notes?: string;
}

export const ASSESSMENT_REPLY_SHAPE = `{
  "summary": "Overall impression summary",
  "categories": {
    "technical_skills": {
      "score": 85,
      "observations": ["Observation 1", "Observation 2"],
      "assessment": "Brief qualitative assessment",
      "subcategories": {
        "core_knowledge": 80,
        "problem_solving": 85,
        "coding_skills": 90,
        "tools_technologies": 85
      }
    }
  },
  "strengths": ["Strength 1", "Strength 2", "Strength 3"],
  "improvements": ["Area 1", "Area 2", "Area 3"],
  "role_fit": {
    "rating": "Strong",
    "justification": "Justification text"
  },
  "final_score": 82
}`;

/**
 * Render the assessment instruction for one interview.
 *
 * Pure: the same input and taxonomy always give the same text.
 */
export function buildAssessmentPrompt(input: AssessmentPromptInput, taxonomy: AssessmentTaxonomy): string {
    const { source, jobRole, experienceLevel } = input;
    const candidate = input.candidateName?.trim() || 'Not specified';
    const notes = input.notes?.trim();
    const isVideo = source.kind === 'video';

    const lines = [
        'You are an expert interview assessor with deep experience in talent acquisition and human resources.',
        '',
        isVideo
            ? `Analyze the attached interview recording (${source.reference}) for a ${jobRole} position at ${experienceLevel} experience level.`
            : `Analyze the following interview transcript for a ${jobRole} position at ${experienceLevel} experience level.`,
        '',
        `Candidate: ${candidate}`,
        ''
    ];

    if (source.kind === 'transcript') {
        lines.push('Interview Transcript:', source.transcript, '');
    }

    lines.push(
        'Conduct a comprehensive assessment and provide:',
        '',
        '1. Overall impression and summary (100-150 words)',
        '2. For each category below, provide:',
        '   - A score from 0-100',
        isVideo ? '   - 2-3 specific observations with timestamps' : '   - 2-3 specific observations',
        '   - A brief qualitative assessment (30-50 words)',
        '',
        'Assessment categories:',
        JSON.stringify(taxonomyToRecord(taxonomy), null, 2),
        '',
        'For each subcategory, provide a score from 0-100.',
        '',
        '3. Key strengths (3-5 bullet points)',
        '4. Areas for improvement (3-5 bullet points)',
        '5. Overall fit for the role (Strong/Moderate/Limited) with justification',
        '6. Final score out of 100 based on weighted category scores',
        ''
    );

    if (notes) {
        lines.push('Additional focus areas to consider:', notes, '');
    }

    lines.push(
        'Format your response as a JSON object with the following structure.',
        'Required top-level keys: summary, categories, strengths, improvements, role_fit, final_score.',
        'Required keys per category: score, observations, assessment; subcategories is optional.',
        'Use only the category and subcategory ids listed above.',
        ASSESSMENT_REPLY_SHAPE,
        '',
        'Make sure your JSON is valid with proper escaping of quotes and special characters.'
    );

    return lines.join('\n');
}
