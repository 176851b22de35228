import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/assessment.errors';
import { AnalysisMode } from '../types/assessment';

loadDotenv();

const optionalSecret = z
    .string()
    .optional()
    .transform(value => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    STORAGE_DIR: z.string().min(1).default('./storage'),
    ASSEMBLYAI_API_KEY: optionalSecret,
    ASSEMBLYAI_BASE_URL: z.string().url().default('https://api.assemblyai.com/v2'),
    MODEL_PROVIDER: z.enum(['openai', 'gemini']).default('openai'),
    OPENAI_API_KEY: optionalSecret,
    LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    GOOGLE_API_KEY: optionalSecret,
    GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    MAX_FILE_SIZE_MB: z.coerce.number().positive().default(100),
    TRANSCRIPTION_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
    TRANSCRIPTION_MAX_WAIT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000)
});

export type ModelProviderName = 'openai' | 'gemini';

export interface AppConfig {
    nodeEnv: string;
    port: number;
    logLevel: string;
    storageDir: string;
    assemblyAiApiKey?: string;
    assemblyAiBaseUrl: string;
    modelProvider: ModelProviderName;
    openaiApiKey?: string;
    llmModel: string;
    llmTemperature: number;
    googleApiKey?: string;
    geminiModel: string;
    maxFileSizeBytes: number;
    transcriptionPollIntervalMs: number;
    transcriptionMaxWaitMs: number;
}

/**
 * Parse the process environment into a typed configuration.
 *
 * API keys stay optional here so the server can boot and report what is
 * missing; `requireApiKeys` enforces them before a submission is accepted.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    const values = parsed.data;
    return {
        nodeEnv: values.NODE_ENV,
        port: values.PORT,
        logLevel: values.LOG_LEVEL,
        storageDir: values.STORAGE_DIR,
        assemblyAiApiKey: values.ASSEMBLYAI_API_KEY,
        assemblyAiBaseUrl: values.ASSEMBLYAI_BASE_URL.replace(/\/+$/, ''),
        modelProvider: values.MODEL_PROVIDER,
        openaiApiKey: values.OPENAI_API_KEY,
        llmModel: values.LLM_MODEL,
        llmTemperature: values.LLM_TEMPERATURE,
        googleApiKey: values.GOOGLE_API_KEY,
        geminiModel: values.GEMINI_MODEL,
        maxFileSizeBytes: Math.round(values.MAX_FILE_SIZE_MB * 1024 * 1024),
        transcriptionPollIntervalMs: values.TRANSCRIPTION_POLL_INTERVAL_MS,
        transcriptionMaxWaitMs: values.TRANSCRIPTION_MAX_WAIT_MS
    };
}

export interface ResolvedApiKeys {
    assemblyAiApiKey?: string;
    modelProvider: ModelProviderName;
    modelApiKey: string;
}

/**
 * Ensure the secrets needed for a submission are present.
 *
 * Transcript mode needs the transcription key plus the selected model
 * provider's key. Video mode sends media straight to Gemini, so only the
 * Google key is needed.
 */
export function requireApiKeys(config: AppConfig, mode: AnalysisMode): ResolvedApiKeys {
    if (mode === 'video') {
        if (!config.googleApiKey) {
            throw new ConfigurationError('GOOGLE_API_KEY is not configured; it is required for video analysis.');
        }
        return { modelProvider: 'gemini', modelApiKey: config.googleApiKey };
    }

    if (!config.assemblyAiApiKey) {
        throw new ConfigurationError('ASSEMBLYAI_API_KEY is not configured; it is required for transcription.');
    }

    const modelApiKey = config.modelProvider === 'openai' ? config.openaiApiKey : config.googleApiKey;
    if (!modelApiKey) {
        const name = config.modelProvider === 'openai' ? 'OPENAI_API_KEY' : 'GOOGLE_API_KEY';
        throw new ConfigurationError(`${name} is not configured; it is required for interview analysis.`);
    }

    return {
        assemblyAiApiKey: config.assemblyAiApiKey,
        modelProvider: config.modelProvider,
        modelApiKey
    };
}
