import fs from 'fs';
import fetch from 'node-fetch';
import { z } from 'zod';
import { logger, ILogger } from '../config/logger';
import {
    JobStartError,
    PollError,
    TranscriptionFailed,
    TranscriptionTimeout,
    UploadError,
    errorMessage
} from '../errors/assessment.errors';
import { TranscriptionJob } from '../types/assessment';

export const UPLOAD_CHUNK_SIZE = 5 * 1024 * 1024;
export const UPLOAD_TIMEOUT_MS = 5 * 60 * 1000;
export const REQUEST_TIMEOUT_MS = 30 * 1000;

export interface HttpRequestInit {
    method: 'GET' | 'POST';
    headers: Record<string, string>;
    body?: string | NodeJS.ReadableStream;
    timeout: number;
}

export interface HttpResponse {
    ok: boolean;
    status: number;
    statusText: string;
    json(): Promise<unknown>;
    text(): Promise<string>;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface ITranscriptionService {
    transcribe(filePath: string, onProgress?: (message: string) => void): Promise<string>;
}

export interface TranscriptionServiceOptions {
    baseUrl?: string;
    pollIntervalMs?: number;
    maxWaitMs?: number;
    fetch?: HttpFetch;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

const uploadResponseSchema = z.object({ upload_url: z.string().min(1) });

const startResponseSchema = z.object({ id: z.string().min(1) });

const statusResponseSchema = z.object({
    id: z.string().optional(),
    status: z.enum(['queued', 'processing', 'completed', 'error']),
    text: z.string().nullish(),
    error: z.string().nullish()
});

/**
 * Transcription Service
 *
 * Client for an AssemblyAI-style speech-to-text API: upload the media,
 * start a transcript job, then poll until it completes, errors, or the
 * wall-clock ceiling passes.
 */
export class TranscriptionService implements ITranscriptionService {
    private readonly baseUrl: string;
    private readonly pollIntervalMs: number;
    private readonly maxWaitMs: number;
    private readonly fetch: HttpFetch;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private apiKey: string,
        private logger: ILogger,
        options: TranscriptionServiceOptions = {}
    ) {
        this.baseUrl = (options.baseUrl ?? 'https://api.assemblyai.com/v2').replace(/\/+$/, '');
        this.pollIntervalMs = options.pollIntervalMs ?? 2000;
        this.maxWaitMs = options.maxWaitMs ?? 30 * 60 * 1000;
        this.fetch = options.fetch ?? fetch;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    }

    static create(apiKey: string, options: TranscriptionServiceOptions = {}): TranscriptionService {
        return new TranscriptionService(apiKey, logger, options);
    }

    /**
     * Stream the file to the provider in fixed-size chunks. The read stream
     * is destroyed once the request settles, whether or not it was consumed.
     */
    async upload(filePath: string): Promise<string> {
        const stream = fs.createReadStream(filePath, { highWaterMark: UPLOAD_CHUNK_SIZE });
        const readFailure: { error?: Error } = {};
        stream.on('error', error => {
            readFailure.error = error;
            this.logger.warn({ filePath, error: error.message }, 'Failed to read media for upload');
        });

        try {
            const response = await this.send(`${this.baseUrl}/upload`, {
                method: 'POST',
                headers: { authorization: this.apiKey, 'content-type': 'application/octet-stream' },
                body: stream,
                timeout: UPLOAD_TIMEOUT_MS
            }, cause => new UploadError(`Failed to upload file: ${errorMessage(readFailure.error ?? cause)}`, { cause }));

            if (readFailure.error) {
                throw new UploadError(`Failed to upload file: ${readFailure.error.message}`, { cause: readFailure.error });
            }

            const body = uploadResponseSchema.safeParse(await this.readJson(response, UploadError));
            if (!body.success) {
                throw new UploadError('Failed to upload file: response did not include an upload URL');
            }

            this.logger.info({ filePath }, 'Media uploaded for transcription');
            return body.data.upload_url;
        } finally {
            stream.destroy();
        }
    }

    async startJob(uploadUrl: string): Promise<string> {
        const response = await this.send(`${this.baseUrl}/transcript`, {
            method: 'POST',
            headers: { authorization: this.apiKey, 'content-type': 'application/json' },
            body: JSON.stringify({
                audio_url: uploadUrl,
                language_detection: true,
                punctuate: true,
                format_text: true
            }),
            timeout: REQUEST_TIMEOUT_MS
        }, cause => new JobStartError(`Failed to start transcription: ${errorMessage(cause)}`, { cause }));

        const body = startResponseSchema.safeParse(await this.readJson(response, JobStartError));
        if (!body.success) {
            throw new JobStartError('Failed to start transcription: response did not include a job id');
        }

        this.logger.info({ transcriptId: body.data.id }, 'Transcription job started');
        return body.data.id;
    }

    /**
     * Fetch the job status once. Does not retry.
     */
    async pollStatus(jobId: string): Promise<TranscriptionJob> {
        const response = await this.send(`${this.baseUrl}/transcript/${encodeURIComponent(jobId)}`, {
            method: 'GET',
            headers: { authorization: this.apiKey },
            timeout: REQUEST_TIMEOUT_MS
        }, cause => new PollError(`Failed to check transcription status: ${errorMessage(cause)}`, { cause }));

        const body = statusResponseSchema.safeParse(await this.readJson(response, PollError));
        if (!body.success) {
            throw new PollError('Failed to check transcription status: unexpected response shape');
        }

        return {
            id: jobId,
            status: body.data.status,
            text: body.data.text,
            error: body.data.error
        };
    }

    async transcribe(filePath: string, onProgress?: (message: string) => void): Promise<string> {
        try {
            onProgress?.('Uploading file...');
            const uploadUrl = await this.upload(filePath);

            onProgress?.('Starting transcription...');
            const jobId = await this.startJob(uploadUrl);

            const startedAt = this.now();
            let polls = 0;

            while (this.now() - startedAt < this.maxWaitMs) {
                onProgress?.('Processing audio...');
                const job = await this.pollStatus(jobId);
                polls++;

                if (job.status === 'completed') {
                    this.logger.info({
                        transcriptId: jobId,
                        polls,
                        textLength: job.text?.length || 0
                    }, 'Transcription completed');
                    return job.text ?? '';
                }

                if (job.status === 'error') {
                    throw new TranscriptionFailed(`Transcription failed: ${job.error || 'Unknown transcription error'}`);
                }

                await this.sleep(this.pollIntervalMs);
            }

            throw new TranscriptionTimeout(this.maxWaitMs);

        } catch (error) {
            this.logger.error({ filePath, error: errorMessage(error) }, 'Transcription workflow failed');

            if (error instanceof UploadError || error instanceof JobStartError || error instanceof PollError) {
                throw new TranscriptionFailed(`Transcription failed: ${error.message}`, { cause: error });
            }
            throw error;
        }
    }

    private async send(
        url: string,
        init: HttpRequestInit,
        wrap: (cause: unknown) => Error
    ): Promise<HttpResponse> {
        let response: HttpResponse;
        try {
            response = await this.fetch(url, init);
        } catch (error) {
            throw wrap(error);
        }

        if (!response.ok) {
            const detail = await response.text().catch(() => '');
            throw wrap(new Error(`HTTP ${response.status} ${response.statusText}${detail ? ` - ${detail}` : ''}`));
        }
        return response;
    }

    private async readJson(
        response: HttpResponse,
        ErrorType: new (message: string, options?: { cause?: unknown }) => Error
    ): Promise<unknown> {
        try {
            return await response.json();
        } catch (error) {
            throw new ErrorType(`Provider returned invalid JSON: ${errorMessage(error)}`, { cause: error });
        }
    }
}
