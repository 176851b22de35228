import { AppConfig, ModelProviderName, requireApiKeys } from '../config/env';
import { logger as defaultLogger, ILogger } from '../config/logger';
import { errorMessage } from '../errors/assessment.errors';
import { AssessmentService, IAssessmentService } from '../services/assessment.service';
import { GeminiService } from '../services/gemini.service';
import { IModelProvider } from '../services/model-provider';
import { OpenAIService } from '../services/openai.service';
import { ITranscriptionService, TranscriptionService } from '../services/transcription.service';
import { SessionStore, SubmissionRecord } from '../session/session-store';
import { InterviewContext } from '../types/assessment';
import { InterviewPipeline, PipelineOutcome, TempMedia } from './interview-pipeline';

export interface ServiceFactory {
    createTranscription(apiKey: string): ITranscriptionService;
    createModelProvider(provider: ModelProviderName, apiKey: string): IModelProvider;
    createAssessment(provider: IModelProvider): IAssessmentService;
}

export function createServiceFactory(config: AppConfig): ServiceFactory {
    return {
        createTranscription: apiKey => TranscriptionService.create(apiKey, {
            baseUrl: config.assemblyAiBaseUrl,
            pollIntervalMs: config.transcriptionPollIntervalMs,
            maxWaitMs: config.transcriptionMaxWaitMs
        }),
        createModelProvider: (provider, apiKey) => provider === 'openai'
            ? OpenAIService.create(apiKey, config.llmModel, config.llmTemperature)
            : GeminiService.create(apiKey, config.geminiModel),
        createAssessment: provider => AssessmentService.create(provider)
    };
}

export interface Submission {
    submission: SubmissionRecord;
    done: Promise<PipelineOutcome>;
}

/**
 * Interview Processor
 *
 * Accepts a stored upload, checks configuration, registers the submission
 * with the session and runs a fresh pipeline in the background. Progress and
 * the final outcome are written back to the session.
 */
export class InterviewProcessor {
    constructor(
        private config: AppConfig,
        private session: SessionStore,
        private logger: ILogger = defaultLogger,
        private factory: ServiceFactory = createServiceFactory(config)
    ) { }

    async submit(media: TempMedia, context: InterviewContext): Promise<Submission> {
        let submission: SubmissionRecord;
        let pipeline: InterviewPipeline;

        try {
            const keys = requireApiKeys(this.config, context.mode);
            const transcription = context.mode === 'transcript' && keys.assemblyAiApiKey
                ? this.factory.createTranscription(keys.assemblyAiApiKey)
                : null;
            const assessment = this.factory.createAssessment(
                this.factory.createModelProvider(keys.modelProvider, keys.modelApiKey)
            );

            submission = this.session.begin(context, media.originalName);
            const submissionId = submission.id;
            pipeline = new InterviewPipeline(transcription, assessment, this.logger, event => {
                this.session.recordProgress(submissionId, event);
            });
        } catch (error) {
            await media.release();
            throw error;
        }

        this.logger.info({
            submissionId: submission.id,
            file: media.originalName,
            mode: context.mode
        }, 'Interview submission accepted');

        const submissionId = submission.id;
        const done = pipeline.run(media, context).then(
            outcome => {
                this.session.finish(submissionId, outcome);
                return outcome;
            },
            (error: unknown) => {
                this.logger.error({ submissionId, error: errorMessage(error) }, 'Interview pipeline crashed');
                const outcome: PipelineOutcome = {
                    status: 'failed',
                    failedAt: pipeline.currentState,
                    error: {
                        code: 'internal_error',
                        message: 'An unexpected error occurred during analysis. Please try again.'
                    }
                };
                this.session.finish(submissionId, outcome);
                return outcome;
            }
        );

        return { submission, done };
    }
}
