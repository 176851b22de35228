import { createApp } from './app';
import { loadConfig } from './config/env';
import { logger } from './config/logger';
import { errorMessage } from './errors/assessment.errors';
import { SessionStore } from './session/session-store';
import { ASSESSMENT_TAXONOMY, isBalanced, totalWeight } from './taxonomy/assessment-taxonomy';
import { InterviewProcessor } from './workers/interview-processor';

function startServer() {
    try {
        const config = loadConfig();

        if (!isBalanced(ASSESSMENT_TAXONOMY)) {
            logger.warn({ totalWeight: totalWeight(ASSESSMENT_TAXONOMY) }, 'Assessment taxonomy weights do not sum to 1');
        }

        const session = new SessionStore();
        const processor = new InterviewProcessor(config, session);
        const app = createApp({ config, session, processor });

        app.listen(config.port, () => {
            logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);
            logger.info({
                modelProvider: config.modelProvider,
                transcription: Boolean(config.assemblyAiApiKey),
                storageDir: config.storageDir
            }, 'Interview assessment service ready');
            logger.info('Available endpoints:');
            logger.info('  POST /interviews - Upload a recording and start analysis');
            logger.info('  GET /interviews/current - Submission status and progress');
            logger.info('  DELETE /interviews/current - Clear the stored analysis');
            logger.info('  GET /result - Latest assessment');
            logger.info('  GET /result/analytics - Score insights');
            logger.info('  GET /result/export/:format - Export as json, csv or txt');
            logger.info('  GET /taxonomy - Assessment categories');
            logger.info('  GET /health - Health check');
        });
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to start server');
        process.exit(1);
    }
}

startServer();
