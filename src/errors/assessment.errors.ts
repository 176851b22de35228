/**
 * Assessment Error Taxonomy
 *
 * Every failure the pipeline can surface has its own class with a stable
 * `code` (used in API payloads and logs) and an HTTP status for the routes.
 * The message of each error is safe to show to the end user.
 */

export type AssessmentErrorCode =
    | 'configuration_error'
    | 'validation_error'
    | 'upload_error'
    | 'job_start_error'
    | 'poll_error'
    | 'transcription_failed'
    | 'transcription_timeout'
    | 'empty_transcript'
    | 'model_unavailable'
    | 'analysis_parse_error'
    | 'quota_exceeded'
    | 'submission_in_progress'
    | 'no_result'
    | 'internal_error';

export abstract class AssessmentError extends Error {
    abstract readonly code: AssessmentErrorCode;
    abstract readonly httpStatus: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends AssessmentError {
    readonly code = 'configuration_error';
    readonly httpStatus = 503;
}

export class ValidationError extends AssessmentError {
    readonly code = 'validation_error';
    readonly httpStatus = 400;
}

// Transport/provider failures inside the transcription client

export class UploadError extends AssessmentError {
    readonly code = 'upload_error';
    readonly httpStatus = 502;
}

export class JobStartError extends AssessmentError {
    readonly code = 'job_start_error';
    readonly httpStatus = 502;
}

export class PollError extends AssessmentError {
    readonly code = 'poll_error';
    readonly httpStatus = 502;
}

export class TranscriptionFailed extends AssessmentError {
    readonly code = 'transcription_failed';
    readonly httpStatus = 502;
}

export class TranscriptionTimeout extends AssessmentError {
    readonly code = 'transcription_timeout';
    readonly httpStatus = 504;

    constructor(readonly maxWaitMs: number) {
        super(`Transcription timed out after ${Math.round(maxWaitMs / 1000)}s`);
    }
}

export class EmptyTranscript extends AssessmentError {
    readonly code = 'empty_transcript';
    readonly httpStatus = 422;

    constructor() {
        super('No speech detected in the audio. Please check the file quality.');
    }
}

export class ModelUnavailable extends AssessmentError {
    readonly code = 'model_unavailable';
    readonly httpStatus = 502;
}

export class AnalysisParseError extends AssessmentError {
    readonly code = 'analysis_parse_error';
    readonly httpStatus = 502;
}

export const QUOTA_EXCEEDED_MESSAGE = 'API quota exceeded. Please check your billing or try again later.';

export class QuotaExceeded extends AssessmentError {
    readonly code = 'quota_exceeded';
    readonly httpStatus = 429;

    constructor(options?: { cause?: unknown }) {
        super(QUOTA_EXCEEDED_MESSAGE, options);
    }
}

export class SubmissionInProgressError extends AssessmentError {
    readonly code = 'submission_in_progress';
    readonly httpStatus = 409;

    constructor() {
        super('An interview is already being analyzed. Wait for it to finish before submitting another.');
    }
}

export class NoResultError extends AssessmentError {
    readonly code = 'no_result';
    readonly httpStatus = 404;

    constructor() {
        super('Complete an interview analysis first to view results.');
    }
}

/**
 * Provider messages mentioning quota or billing exhaustion.
 */
export function isQuotaMessage(message: string): boolean {
    const lower = message.toLowerCase();
    return lower.includes('quota') || lower.includes('billing');
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Collapse any thrown value into the `{ code, message }` pair shown to users.
 * Unknown errors never leak their raw provider text.
 */
export function toUserFacingError(error: unknown): { code: AssessmentErrorCode; message: string } {
    if (error instanceof AssessmentError) {
        return { code: error.code, message: error.message };
    }
    return {
        code: 'internal_error',
        message: 'An unexpected error occurred during analysis. Please try again.'
    };
}
