import path from 'path';
import { logger, ILogger } from '../config/logger';
import {
    AnalysisParseError,
    AssessmentError,
    ConfigurationError,
    ModelUnavailable,
    QuotaExceeded,
    errorMessage,
    isQuotaMessage
} from '../errors/assessment.errors';
import { PromptSource, buildAssessmentPrompt } from '../prompts/assessment.prompt';
import { validateAssessmentPayload } from '../schemas/assessment.schema';
import { ASSESSMENT_TAXONOMY, AssessmentTaxonomy, weightedScore } from '../taxonomy/assessment-taxonomy';
import { AssessmentPayload, AssessmentResult, AssessmentSource, InterviewContext } from '../types/assessment';
import { deepFreeze } from '../utils/freeze.util';
import { extractJsonCandidate, safeJsonParse } from '../utils/json-extract.util';
import { IRetryUtil, RetryUtil } from '../utils/retry.util';
import { IModelProvider, MediaAttachment, ModelRequest, PreparedMedia } from './model-provider';

export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 2000;
// Reported final scores further than this from the weighted recomputation are logged
export const FINAL_SCORE_TOLERANCE = 10;

export interface IAssessmentService {
    analyze(source: AssessmentSource, context: InterviewContext): Promise<AssessmentResult>;
}

export interface AssessmentServiceOptions {
    maxRetries?: number;
    retryDelayMs?: number;
    taxonomy?: AssessmentTaxonomy;
    now?: () => Date;
}

// A reply that came back but could not be turned into an assessment
class ReplyParseFailure extends Error { }

/**
 * Assessment Service
 *
 * Builds the rubric prompt, asks the model provider for a JSON assessment,
 * validates it strictly against the taxonomy and attaches run metadata.
 * Only malformed replies are retried; provider failures surface at once.
 */
export class AssessmentService implements IAssessmentService {
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;
    private readonly taxonomy: AssessmentTaxonomy;
    private readonly now: () => Date;

    constructor(
        private provider: IModelProvider,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        options: AssessmentServiceOptions = {}
    ) {
        this.maxRetries = options.maxRetries ?? MAX_RETRIES;
        this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
        this.taxonomy = options.taxonomy ?? ASSESSMENT_TAXONOMY;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Factory method for production use
     */
    static create(provider: IModelProvider): AssessmentService {
        return new AssessmentService(provider, RetryUtil, logger);
    }

    async analyze(source: AssessmentSource, context: InterviewContext): Promise<AssessmentResult> {
        const { promptSource, media } = this.describeSource(source);

        if (media && !this.provider.supportsMedia) {
            throw new ConfigurationError(`Model ${this.provider.modelName} cannot analyze media directly`);
        }

        const prompt = buildAssessmentPrompt({
            source: promptSource,
            jobRole: context.jobRole,
            experienceLevel: context.experienceLevel,
            candidateName: context.candidateName,
            notes: context.notes
        }, this.taxonomy);

        this.logger.info({
            jobRole: context.jobRole,
            experienceLevel: context.experienceLevel,
            source: source.kind,
            promptLength: prompt.length
        }, 'Generated analysis prompt');

        let prepared: PreparedMedia | undefined;
        try {
            // Media is uploaded once and shared by every parse attempt
            if (media) {
                prepared = await this.provider.prepareMedia(media);
            }
            const request: ModelRequest = { prompt, media: prepared };

            const outcome = await this.retryUtil.executeWithRetry(
                async attempt => {
                    this.logger.info({ attempt, maxAttempts: this.maxRetries }, 'Requesting interview analysis');
                    const reply = await this.provider.generate(request);
                    const text = reply.text?.trim();
                    if (!text) {
                        throw new ModelUnavailable('Empty response from AI model');
                    }
                    return { payload: this.parseReply(text), model: reply.model };
                },
                {
                    maxAttempts: this.maxRetries,
                    baseDelay: this.retryDelayMs,
                    maxDelay: this.retryDelayMs,
                    backoffMultiplier: 1,
                    operationName: 'Interview analysis',
                    isRetryable: error => error instanceof ReplyParseFailure
                }
            );

            if (!outcome.ok) {
                throw new AnalysisParseError(
                    `Failed to parse AI response after ${outcome.attempts} attempts`,
                    { cause: outcome.error }
                );
            }

            const { payload, model } = outcome.value;
            this.checkFinalScore(payload);

            const result: AssessmentResult = {
                ...payload,
                metadata: {
                    analysis_timestamp: this.now().toISOString(),
                    job_role: context.jobRole,
                    experience_level: context.experienceLevel,
                    candidate_name: context.candidateName ?? '',
                    model_used: model
                }
            };

            this.logger.info({
                attempts: outcome.attempts,
                finalScore: result.final_score,
                categories: Object.keys(result.categories).length
            }, 'Interview analysis completed');

            return deepFreeze(result);

        } catch (error) {
            this.logger.error({ error: errorMessage(error) }, 'Interview analysis failed');
            throw this.classify(error);
        } finally {
            if (prepared) {
                await this.provider.releaseMedia(prepared);
            }
        }
    }

    private describeSource(source: AssessmentSource): { promptSource: PromptSource; media?: MediaAttachment } {
        if (source.kind === 'transcript') {
            return { promptSource: { kind: 'transcript', transcript: source.transcript } };
        }
        const reference = path.basename(source.filePath);
        return {
            promptSource: { kind: 'video', reference },
            media: { filePath: source.filePath, mimeType: source.mimeType, displayName: reference }
        };
    }

    private parseReply(text: string): AssessmentPayload {
        const parsed = safeJsonParse(extractJsonCandidate(text));
        if (!parsed.ok) {
            throw new ReplyParseFailure(`Reply is not valid JSON: ${parsed.error}`);
        }

        const validation = validateAssessmentPayload(parsed.value, this.taxonomy);
        if (!validation.ok) {
            throw new ReplyParseFailure(`Reply does not match the assessment schema: ${validation.issues.join('; ')}`);
        }
        return validation.payload;
    }

    private checkFinalScore(payload: AssessmentPayload): void {
        const expected = weightedScore(this.taxonomy, payload.categories);
        if (expected !== null && Math.abs(expected - payload.final_score) > FINAL_SCORE_TOLERANCE) {
            this.logger.warn({
                reported: payload.final_score,
                weighted: Math.round(expected * 10) / 10
            }, 'Reported final score differs from weighted category scores');
        }
    }

    private classify(error: unknown): AssessmentError {
        if (isQuotaMessage(errorMessage(error))) {
            return new QuotaExceeded({ cause: error });
        }
        if (error instanceof AssessmentError) {
            return error;
        }
        return new ModelUnavailable(`Analysis failed: ${errorMessage(error)}`, { cause: error });
    }
}
