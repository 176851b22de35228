import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AnalysisParseError, TranscriptionFailed } from '../../../src/errors/assessment.errors';
import { IAssessmentService } from '../../../src/services/assessment.service';
import { ITranscriptionService } from '../../../src/services/transcription.service';
import { InterviewContext } from '../../../src/types/assessment';
import { InterviewPipeline, ProgressEvent, TempMedia } from '../../../src/workers/interview-pipeline';

const context: InterviewContext = {
    jobRole: 'Backend Engineer',
    experienceLevel: 'Senior (6-10 years)',
    candidateName: 'Jane Doe',
    mode: 'transcript'
};

describe('Interview Pipeline', () => {
    const mockTranscribe = vi.fn<ITranscriptionService['transcribe']>();
    const mockAnalyze = vi.fn<IAssessmentService['analyze']>();
    const mockRelease = vi.fn<TempMedia['release']>();
    const mockLogger = globalThis.testUtils.createMockLogger();

    let events: ProgressEvent[];
    let media: TempMedia;

    const createPipeline = (withTranscription: boolean = true) => new InterviewPipeline(
        withTranscription ? { transcribe: mockTranscribe } : null,
        { analyze: mockAnalyze },
        mockLogger,
        event => events.push(event)
    );

    beforeEach(() => {
        vi.clearAllMocks();
        mockTranscribe.mockReset();
        mockAnalyze.mockReset();
        mockRelease.mockReset();
        mockRelease.mockResolvedValue(undefined);

        events = [];
        media = {
            path: '/tmp/storage/interview-1.mp4',
            mimeType: 'video/mp4',
            originalName: 'interview.mp4',
            release: mockRelease
        };
    });

    it('should run transcription then analysis and report progress in order', async () => {
        const result = globalThis.testUtils.generateMockResult();
        mockTranscribe.mockImplementation(async (filePath, onProgress) => {
            onProgress?.('Uploading file...');
            onProgress?.('Processing audio...');
            return 'Candidate: I built a payments service.';
        });
        mockAnalyze.mockResolvedValue(result);

        const pipeline = createPipeline();
        const outcome = await pipeline.run(media, context);

        expect(outcome).toEqual({
            status: 'complete',
            result,
            transcript: 'Candidate: I built a payments service.'
        });
        expect(pipeline.currentState).toBe('complete');
        expect(mockTranscribe).toHaveBeenCalledWith('/tmp/storage/interview-1.mp4', expect.any(Function));
        expect(mockAnalyze).toHaveBeenCalledWith(
            { kind: 'transcript', transcript: 'Candidate: I built a payments service.' },
            context
        );
        expect(events).toEqual([
            { state: 'uploaded', message: 'Recording received', progress: 0.1 },
            { state: 'transcribing', message: 'Transcribing audio...', progress: 0.2 },
            { state: 'transcribing', message: 'Uploading file...', progress: 0.4 },
            { state: 'transcribing', message: 'Processing audio...', progress: 0.4 },
            { state: 'transcribed', message: 'Transcription complete', progress: 0.5 },
            { state: 'analyzing', message: 'Analyzing interview...', progress: 0.6 },
            { state: 'analyzing', message: 'Saving results...', progress: 0.9 },
            { state: 'complete', message: 'Analysis complete!', progress: 1 }
        ]);
    });

    it('should fail on an empty transcript without calling the analyzer', async () => {
        mockTranscribe.mockResolvedValue('   \n ');

        const outcome = await createPipeline().run(media, context);

        expect(outcome).toEqual({
            status: 'failed',
            failedAt: 'transcribing',
            error: {
                code: 'empty_transcript',
                message: 'No speech detected in the audio. Please check the file quality.'
            }
        });
        expect(mockAnalyze).not.toHaveBeenCalled();
        expect(events[events.length - 1]).toEqual({
            state: 'failed',
            message: 'No speech detected in the audio. Please check the file quality.',
            progress: 0.2
        });
    });

    it('should send the media itself for analysis in video mode', async () => {
        mockAnalyze.mockResolvedValue(globalThis.testUtils.generateMockResult());

        const outcome = await createPipeline(false).run(media, { ...context, mode: 'video' });

        expect(outcome.status).toBe('complete');
        expect(mockTranscribe).not.toHaveBeenCalled();
        expect(mockAnalyze).toHaveBeenCalledWith(
            { kind: 'video', filePath: '/tmp/storage/interview-1.mp4', mimeType: 'video/mp4' },
            { ...context, mode: 'video' }
        );
        expect(events.map(event => event.state)).toEqual(['uploaded', 'analyzing', 'analyzing', 'complete']);
    });

    it('should fail with a configuration error when transcript mode has no transcriber', async () => {
        const outcome = await createPipeline(false).run(media, context);

        expect(outcome).toMatchObject({
            status: 'failed',
            failedAt: 'transcribing',
            error: { code: 'configuration_error' }
        });
        expect(mockRelease).toHaveBeenCalledTimes(1);
    });

    it('should hide unexpected error details from the user', async () => {
        mockTranscribe.mockResolvedValue('Some words.');
        mockAnalyze.mockRejectedValue(new TypeError('cannot read properties of undefined'));

        const outcome = await createPipeline().run(media, context);

        expect(outcome).toEqual({
            status: 'failed',
            failedAt: 'analyzing',
            error: {
                code: 'internal_error',
                message: 'An unexpected error occurred during analysis. Please try again.'
            }
        });
    });

    describe('temporary media cleanup', () => {
        it.each([
            {
                name: 'transcription failure',
                setup: () => mockTranscribe.mockRejectedValue(new TranscriptionFailed('Transcription failed: bad audio')),
                status: 'failed',
                failedAt: 'transcribing'
            },
            {
                name: 'empty transcript',
                setup: () => mockTranscribe.mockResolvedValue('   '),
                status: 'failed',
                failedAt: 'transcribing'
            },
            {
                name: 'analysis failure',
                setup: () => {
                    mockTranscribe.mockResolvedValue('Some words.');
                    mockAnalyze.mockRejectedValue(new AnalysisParseError('Failed to parse AI response after 3 attempts'));
                },
                status: 'failed',
                failedAt: 'analyzing'
            },
            {
                name: 'success',
                setup: () => {
                    mockTranscribe.mockResolvedValue('Some words.');
                    mockAnalyze.mockResolvedValue(globalThis.testUtils.generateMockResult());
                },
                status: 'complete',
                failedAt: undefined
            }
        ])('should release the media exactly once on $name', async ({ setup, status, failedAt }) => {
            setup();

            const outcome = await createPipeline().run(media, context);

            expect(outcome.status).toBe(status);
            if (outcome.status === 'failed') {
                expect(outcome.failedAt).toBe(failedAt);
            }
            expect(mockRelease).toHaveBeenCalledTimes(1);
        });

        it('should log and swallow a release failure', async () => {
            mockTranscribe.mockResolvedValue('Some words.');
            mockAnalyze.mockResolvedValue(globalThis.testUtils.generateMockResult());
            mockRelease.mockRejectedValue(new Error('EBUSY'));

            const outcome = await createPipeline().run(media, context);

            expect(outcome.status).toBe('complete');
            expect(mockLogger.warn).toHaveBeenCalledWith(
                { file: '/tmp/storage/interview-1.mp4', error: 'EBUSY' },
                'Failed to remove temporary media'
            );
        });
    });

    it('should refuse to run twice', async () => {
        mockTranscribe.mockResolvedValue('Some words.');
        mockAnalyze.mockResolvedValue(globalThis.testUtils.generateMockResult());
        const pipeline = createPipeline();

        await pipeline.run(media, context);

        await expect(pipeline.run(media, context)).rejects.toThrow('Pipeline already used (state: complete)');
        expect(mockRelease).toHaveBeenCalledTimes(1);
    });
});
