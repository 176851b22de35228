import OpenAI from 'openai';
import { logger, ILogger } from '../config/logger';
import { IModelProvider, MediaAttachment, ModelReply, ModelRequest, PreparedMedia } from './model-provider';

const MEDIA_UNSUPPORTED = 'OpenAI provider does not accept media attachments; use the Gemini provider for video analysis';

export interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

// Narrow view of the OpenAI SDK for testability
export interface IOpenAIClient {
    chat: {
        completions: {
            create(params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
            }): Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { total_tokens: number };
            }>;
        };
    };
}

/**
 * OpenAI Service with Dependency Injection
 *
 * Sends assessment prompts to an OpenAI chat model and returns the raw reply
 * text. Transport errors are not retried here: the assessment service only
 * retries malformed replies.
 */
export class OpenAIService implements IModelProvider {
    readonly supportsMedia = false;

    constructor(
        private client: IOpenAIClient,
        private logger: ILogger,
        private llmModel: string = 'gpt-4o-mini',
        private temperature: number = 0.1,
        private maxTokens: number = 4000
    ) { }

    /**
     * Factory method for production use
     */
    static create(apiKey: string, model: string, temperature: number): OpenAIService {
        const sdk = new OpenAI({ apiKey });

        const client: IOpenAIClient = {
            chat: {
                completions: {
                    create: async params => {
                        const completion = await sdk.chat.completions.create(params);
                        return {
                            choices: completion.choices.map(choice => ({
                                message: { content: choice.message.content }
                            })),
                            usage: completion.usage ? { total_tokens: completion.usage.total_tokens } : undefined
                        };
                    }
                }
            }
        };

        return new OpenAIService(client, logger, model, temperature);
    }

    get modelName(): string {
        return this.llmModel;
    }

    async prepareMedia(media: MediaAttachment): Promise<PreparedMedia> {
        throw new Error(`${MEDIA_UNSUPPORTED} (${media.displayName ?? media.filePath})`);
    }

    async releaseMedia(): Promise<void> {
        // nothing is ever prepared
    }

    async generate(request: ModelRequest): Promise<ModelReply> {
        if (request.media) {
            throw new Error(MEDIA_UNSUPPORTED);
        }

        this.logger.info({
            model: this.llmModel,
            temperature: this.temperature,
            promptLength: request.prompt.length
        }, 'Generating OpenAI completion');

        const response = await this.client.chat.completions.create({
            model: this.llmModel,
            messages: [{ role: 'user', content: request.prompt }],
            temperature: this.temperature,
            max_tokens: this.maxTokens
        });

        const content = response.choices[0]?.message?.content ?? null;

        this.logger.info({
            tokensUsed: response.usage?.total_tokens || 0,
            contentLength: content?.length || 0
        }, 'OpenAI completion received');

        return { text: content, model: this.llmModel };
    }
}
