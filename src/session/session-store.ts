import { randomUUID } from 'crypto';
import { NoResultError, SubmissionInProgressError } from '../errors/assessment.errors';
import { AssessmentResult, InterviewContext } from '../types/assessment';
import { PipelineOutcome, ProgressEvent } from '../workers/interview-pipeline';

export type SubmissionStatus = 'running' | 'complete' | 'failed';

export interface SubmissionRecord {
    id: string;
    context: InterviewContext;
    fileName: string;
    status: SubmissionStatus;
    startedAt: string;
    finishedAt?: string;
    progress: ProgressEvent[];
    error?: { code: string; message: string };
}

export interface SessionSnapshot {
    sessionId: string;
    submission: SubmissionRecord | null;
    hasResult: boolean;
}

/**
 * Session Store
 *
 * In-memory state for a single user session: at most one submission in
 * flight, plus the latest completed assessment and its transcript.
 * Nothing is persisted.
 */
export class SessionStore {
    readonly sessionId: string = randomUUID();
    private submission: SubmissionRecord | null = null;
    private result: AssessmentResult | null = null;
    private transcript: string | null = null;

    constructor(private now: () => Date = () => new Date()) { }

    isRunning(): boolean {
        return this.submission?.status === 'running';
    }

    begin(context: InterviewContext, fileName: string): SubmissionRecord {
        if (this.isRunning()) {
            throw new SubmissionInProgressError();
        }
        this.submission = {
            id: randomUUID(),
            context,
            fileName,
            status: 'running',
            startedAt: this.now().toISOString(),
            progress: []
        };
        return this.submission;
    }

    recordProgress(submissionId: string, event: ProgressEvent): void {
        const submission = this.current(submissionId);
        submission?.progress.push(event);
    }

    /**
     * Store the outcome of a finished run. A successful run replaces the
     * previous result; a failed one leaves it untouched.
     */
    finish(submissionId: string, outcome: PipelineOutcome): void {
        const submission = this.current(submissionId);
        if (!submission) return;

        submission.finishedAt = this.now().toISOString();
        if (outcome.status === 'complete') {
            submission.status = 'complete';
            this.result = outcome.result;
            this.transcript = outcome.transcript ?? null;
        } else {
            submission.status = 'failed';
            submission.error = outcome.error;
        }
    }

    getResult(): AssessmentResult {
        if (!this.result) {
            throw new NoResultError();
        }
        return this.result;
    }

    getTranscript(): string | null {
        return this.transcript;
    }

    /**
     * Drop the stored analysis so a new one can start from a clean slate.
     */
    clear(): void {
        if (this.isRunning()) {
            throw new SubmissionInProgressError();
        }
        this.submission = null;
        this.result = null;
        this.transcript = null;
    }

    snapshot(): SessionSnapshot {
        return {
            sessionId: this.sessionId,
            submission: this.submission
                ? { ...this.submission, progress: [...this.submission.progress] }
                : null,
            hasResult: this.result !== null
        };
    }

    private current(submissionId: string): SubmissionRecord | null {
        return this.submission?.id === submissionId ? this.submission : null;
    }
}
