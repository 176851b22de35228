import { logger as defaultLogger, ILogger } from '../config/logger';
import {
    AssessmentErrorCode,
    ConfigurationError,
    EmptyTranscript,
    errorMessage,
    toUserFacingError
} from '../errors/assessment.errors';
import { IAssessmentService } from '../services/assessment.service';
import { ITranscriptionService } from '../services/transcription.service';
import { AssessmentResult, InterviewContext } from '../types/assessment';

export type PipelineState =
    | 'idle'
    | 'uploaded'
    | 'transcribing'
    | 'transcribed'
    | 'analyzing'
    | 'complete'
    | 'failed';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
    idle: ['uploaded'],
    uploaded: ['transcribing', 'analyzing'],
    transcribing: ['transcribed', 'failed'],
    transcribed: ['analyzing'],
    analyzing: ['complete', 'failed'],
    complete: [],
    failed: []
};

export interface ProgressEvent {
    state: PipelineState;
    message: string;
    progress: number;
}

/**
 * Temporary copy of the uploaded recording. `release` deletes it.
 */
export interface TempMedia {
    path: string;
    mimeType: string;
    originalName: string;
    release(): Promise<void>;
}

export type PipelineOutcome =
    | { status: 'complete'; result: AssessmentResult; transcript?: string }
    | {
        status: 'failed';
        failedAt: PipelineState;
        error: { code: AssessmentErrorCode; message: string };
    };

/**
 * Interview Pipeline
 *
 * Runs one submission through the workflow:
 * Idle -> Uploaded -> Transcribing -> Transcribed -> Analyzing -> Complete
 * Video submissions skip transcription (Uploaded -> Analyzing). Any error in
 * Transcribing or Analyzing ends in Failed. The temporary media is released
 * exactly once whichever way the run ends.
 */
export class InterviewPipeline {
    private state: PipelineState = 'idle';
    private lastProgress = 0;

    constructor(
        private transcription: ITranscriptionService | null,
        private assessment: IAssessmentService,
        private logger: ILogger = defaultLogger,
        private onProgress: (event: ProgressEvent) => void = () => undefined
    ) { }

    get currentState(): PipelineState {
        return this.state;
    }

    async run(media: TempMedia, context: InterviewContext): Promise<PipelineOutcome> {
        if (this.state !== 'idle') {
            throw new Error(`Pipeline already used (state: ${this.state})`);
        }

        this.logger.info({
            file: media.originalName,
            jobRole: context.jobRole,
            experienceLevel: context.experienceLevel,
            mode: context.mode
        }, 'Starting interview processing');

        try {
            this.advance('uploaded', 'Recording received', 0.1);

            let transcript: string | undefined;
            if (context.mode === 'transcript') {
                transcript = await this.transcribe(media);
            }

            this.advance('analyzing', 'Analyzing interview...', 0.6);
            const result = await this.assessment.analyze(
                transcript !== undefined
                    ? { kind: 'transcript', transcript }
                    : { kind: 'video', filePath: media.path, mimeType: media.mimeType },
                context
            );

            this.emit('Saving results...', 0.9);
            this.advance('complete', 'Analysis complete!', 1);

            this.logger.info({
                file: media.originalName,
                finalScore: result.final_score,
                roleFit: result.role_fit.rating
            }, 'Interview processing completed');

            return { status: 'complete', result, transcript };

        } catch (error) {
            return this.fail(error);

        } finally {
            await this.release(media);
        }
    }

    private async transcribe(media: TempMedia): Promise<string> {
        this.advance('transcribing', 'Transcribing audio...', 0.2);

        if (!this.transcription) {
            throw new ConfigurationError('Transcription service is not configured');
        }

        const transcript = await this.transcription.transcribe(media.path, message => {
            this.emit(message, 0.4);
        });

        if (!transcript.trim()) {
            throw new EmptyTranscript();
        }

        this.advance('transcribed', 'Transcription complete', 0.5);
        return transcript;
    }

    private fail(error: unknown): PipelineOutcome {
        const failedAt = this.state;
        const userError = toUserFacingError(error);

        this.logger.error({
            state: failedAt,
            code: userError.code,
            error: errorMessage(error),
            stack: error instanceof Error ? error.stack : undefined
        }, 'Interview processing failed');

        if (!TRANSITIONS[failedAt].includes('failed')) {
            this.logger.warn({ state: failedAt }, 'Failure raised outside a failable state');
        }
        this.state = 'failed';
        this.onProgress({ state: 'failed', message: userError.message, progress: this.lastProgress });

        return { status: 'failed', failedAt, error: userError };
    }

    private advance(next: PipelineState, message: string, progress: number): void {
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new Error(`Illegal pipeline transition ${this.state} -> ${next}`);
        }
        this.state = next;
        this.emit(message, progress);
    }

    private emit(message: string, progress: number): void {
        this.lastProgress = progress;
        this.onProgress({ state: this.state, message, progress });
    }

    private async release(media: TempMedia): Promise<void> {
        try {
            await media.release();
        } catch (error) {
            this.logger.warn({ file: media.path, error: errorMessage(error) }, 'Failed to remove temporary media');
        }
    }
}
