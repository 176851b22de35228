/**
 * TypeScript interfaces for interview assessment records
 *
 * Field names follow the JSON the model is asked to produce, so a validated
 * reply maps onto these types without renaming.
 */

export const EXPERIENCE_LEVELS = [
    'Entry Level (0-2 years)',
    'Mid Level (3-5 years)',
    'Senior (6-10 years)',
    'Expert (10+ years)'
] as const;

export type ExperienceLevel = typeof EXPERIENCE_LEVELS[number];

export const ROLE_FIT_RATINGS = ['Strong', 'Moderate', 'Limited'] as const;

export type RoleFitRating = typeof ROLE_FIT_RATINGS[number];

export type AnalysisMode = 'transcript' | 'video';

export interface InterviewContext {
    readonly jobRole: string;
    readonly experienceLevel: ExperienceLevel;
    readonly candidateName?: string;
    readonly notes?: string;
    readonly mode: AnalysisMode;
}

// What the model assesses: the transcript text, or the uploaded media itself
export type AssessmentSource =
    | { kind: 'transcript'; transcript: string }
    | { kind: 'video'; filePath: string; mimeType: string };

export interface CategoryAssessment {
    score: number;
    observations: string[];
    assessment: string;
    subcategories?: Record<string, number>;
}

export interface RoleFit {
    rating: RoleFitRating;
    justification: string;
}

export interface AssessmentMetadata {
    analysis_timestamp: string;
    job_role: string;
    experience_level: ExperienceLevel;
    candidate_name: string;
    model_used: string;
}

// Reply shape before metadata is attached
export interface AssessmentPayload {
    summary: string;
    categories: Record<string, CategoryAssessment>;
    strengths: string[];
    improvements: string[];
    role_fit: RoleFit;
    final_score: number;
}

export interface AssessmentResult extends AssessmentPayload {
    metadata: AssessmentMetadata;
}

export type TranscriptionStatus = 'queued' | 'processing' | 'completed' | 'error';

export interface TranscriptionJob {
    id: string;
    status: TranscriptionStatus;
    text?: string | null;
    error?: string | null;
}
