import { GoogleGenAI, FileState, createPartFromUri, createUserContent } from '@google/genai';
import { logger, ILogger } from '../config/logger';
import { IModelProvider, MediaAttachment, ModelReply, ModelRequest, PreparedMedia } from './model-provider';

export type MediaState = 'processing' | 'active' | 'failed';

// Narrow view of @google/genai for testability
export interface IGeminiClient {
    uploadFile(media: MediaAttachment): Promise<PreparedMedia>;
    getFileState(name: string): Promise<MediaState>;
    deleteFile(name: string): Promise<void>;
    generateContent(model: string, prompt: string, media?: PreparedMedia): Promise<{
        text: string | undefined;
        candidateCount: number;
    }>;
}

class GoogleGenAIClient implements IGeminiClient {
    constructor(private ai: GoogleGenAI) { }

    async uploadFile(media: MediaAttachment): Promise<PreparedMedia> {
        const file = await this.ai.files.upload({
            file: media.filePath,
            config: { mimeType: media.mimeType, displayName: media.displayName }
        });
        if (!file.name || !file.uri) {
            throw new Error('Gemini file upload returned no file reference');
        }
        return { name: file.name, uri: file.uri, mimeType: file.mimeType ?? media.mimeType };
    }

    async getFileState(name: string): Promise<MediaState> {
        const file = await this.ai.files.get({ name });
        if (file.state === FileState.ACTIVE) return 'active';
        if (file.state === FileState.FAILED) return 'failed';
        return 'processing';
    }

    async deleteFile(name: string): Promise<void> {
        await this.ai.files.delete({ name });
    }

    async generateContent(model: string, prompt: string, media?: PreparedMedia) {
        const response = await this.ai.models.generateContent({
            model,
            contents: media
                ? createUserContent([createPartFromUri(media.uri, media.mimeType), prompt])
                : prompt
        });
        return { text: response.text, candidateCount: response.candidates?.length ?? 0 };
    }
}

export interface GeminiServiceOptions {
    filePollIntervalMs?: number;
    maxFilePolls?: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Gemini Service
 *
 * Model provider that can also take the interview recording itself. Media is
 * uploaded to the Files API once, polled until it becomes active, referenced
 * by every request that needs it, then deleted by `releaseMedia`.
 */
export class GeminiService implements IModelProvider {
    readonly supportsMedia = true;
    private readonly filePollIntervalMs: number;
    private readonly maxFilePolls: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private client: IGeminiClient,
        private logger: ILogger,
        private model: string = 'gemini-2.5-flash',
        options: GeminiServiceOptions = {}
    ) {
        this.filePollIntervalMs = options.filePollIntervalMs ?? 1000;
        this.maxFilePolls = options.maxFilePolls ?? 300;
        this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    }

    static create(apiKey: string, model: string): GeminiService {
        return new GeminiService(new GoogleGenAIClient(new GoogleGenAI({ apiKey })), logger, model);
    }

    get modelName(): string {
        return this.model;
    }

    async prepareMedia(media: MediaAttachment): Promise<PreparedMedia> {
        const uploaded = await this.client.uploadFile(media);
        this.logger.info({ file: uploaded.name, mimeType: uploaded.mimeType }, 'Media uploaded to Gemini');

        try {
            await this.waitUntilActive(uploaded.name);
        } catch (error) {
            await this.releaseMedia(uploaded);
            throw error;
        }
        return uploaded;
    }

    async releaseMedia(media: PreparedMedia): Promise<void> {
        try {
            await this.client.deleteFile(media.name);
            this.logger.info({ file: media.name }, 'Media deleted from Gemini');
        } catch (error) {
            this.logger.warn({
                file: media.name,
                error: error instanceof Error ? error.message : String(error)
            }, 'Failed to delete media from Gemini');
        }
    }

    async generate(request: ModelRequest): Promise<ModelReply> {
        return this.complete(request.prompt, request.media);
    }

    private async complete(prompt: string, media?: PreparedMedia): Promise<ModelReply> {
        this.logger.info({
            model: this.model,
            promptLength: prompt.length,
            withMedia: Boolean(media)
        }, 'Generating Gemini content');

        const response = await this.client.generateContent(this.model, prompt, media);
        const text = response.candidateCount > 0 ? response.text ?? null : null;

        this.logger.info({
            candidates: response.candidateCount,
            contentLength: text?.length || 0
        }, 'Gemini content received');

        return { text, model: this.model };
    }

    private async waitUntilActive(name: string): Promise<void> {
        for (let poll = 0; poll < this.maxFilePolls; poll++) {
            const state = await this.client.getFileState(name);
            if (state === 'active') {
                return;
            }
            if (state === 'failed') {
                throw new Error(`Gemini could not process media file ${name}`);
            }
            await this.sleep(this.filePollIntervalMs);
        }
        throw new Error(`Gemini media file ${name} was not ready after ${this.maxFilePolls} checks`);
    }
}
