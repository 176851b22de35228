import { describe, it, expect } from 'vitest';
import { loadConfig, requireApiKeys } from '../../../src/config/env';
import { ConfigurationError } from '../../../src/errors/assessment.errors';

describe('Environment configuration', () => {
    describe('loadConfig', () => {
        it('should apply defaults', () => {
            const config = loadConfig({});

            expect(config).toMatchObject({
                port: 3000,
                storageDir: './storage',
                assemblyAiBaseUrl: 'https://api.assemblyai.com/v2',
                modelProvider: 'openai',
                llmModel: 'gpt-4o-mini',
                llmTemperature: 0.1,
                geminiModel: 'gemini-2.5-flash',
                maxFileSizeBytes: 100 * 1024 * 1024,
                transcriptionPollIntervalMs: 2000,
                transcriptionMaxWaitMs: 30 * 60 * 1000
            });
            expect(config.openaiApiKey).toBeUndefined();
        });

        it('should coerce numbers and treat blank secrets as missing', () => {
            const config = loadConfig({
                PORT: '8080',
                MAX_FILE_SIZE_MB: '25',
                OPENAI_API_KEY: '   ',
                ASSEMBLYAI_API_KEY: 'test-secret',
                ASSEMBLYAI_BASE_URL: 'https://stt.example.test/v2/'
            });

            expect(config.port).toBe(8080);
            expect(config.maxFileSizeBytes).toBe(25 * 1024 * 1024);
            expect(config.openaiApiKey).toBeUndefined();
            expect(config.assemblyAiApiKey).toBe('test-secret');
            expect(config.assemblyAiBaseUrl).toBe('https://stt.example.test/v2');
        });

        it('should reject invalid values', () => {
            expect(() => loadConfig({ MODEL_PROVIDER: 'other' })).toThrow(ConfigurationError);
            expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
        });
    });

    describe('requireApiKeys', () => {
        it('should require the transcription key in transcript mode', () => {
            const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

            expect(() => requireApiKeys(config, 'transcript'))
                .toThrow('ASSEMBLYAI_API_KEY is not configured; it is required for transcription.');
        });

        it('should require the selected provider key', () => {
            const config = loadConfig({ ASSEMBLYAI_API_KEY: 'test-secret', MODEL_PROVIDER: 'gemini' });

            expect(() => requireApiKeys(config, 'transcript'))
                .toThrow('GOOGLE_API_KEY is not configured; it is required for interview analysis.');
        });

        it('should resolve keys for transcript mode', () => {
            const config = loadConfig({ ASSEMBLYAI_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret-2' });

            expect(requireApiKeys(config, 'transcript')).toEqual({
                assemblyAiApiKey: 'test-secret',
                modelProvider: 'openai',
                modelApiKey: 'test-secret-2'
            });
        });

        it('should only need the Google key in video mode', () => {
            expect(requireApiKeys(loadConfig({ GOOGLE_API_KEY: 'test-secret' }), 'video')).toEqual({
                modelProvider: 'gemini',
                modelApiKey: 'test-secret'
            });
            expect(() => requireApiKeys(loadConfig({ OPENAI_API_KEY: 'test-secret' }), 'video'))
                .toThrow(ConfigurationError);
        });
    });
});
