import express, { Express, Request, Response } from 'express';
import { AppConfig } from './config/env';
import { createInterviewRoutes } from './routes/interviews';
import { createResultRoutes } from './routes/result';
import { SessionStore } from './session/session-store';
import { ASSESSMENT_TAXONOMY, AssessmentTaxonomy, taxonomyToRecord } from './taxonomy/assessment-taxonomy';
import { EXPERIENCE_LEVELS } from './types/assessment';
import { ALLOWED_MEDIA_EXTENSIONS } from './utils/media.util';
import { InterviewProcessor } from './workers/interview-processor';

export interface AppDeps {
    config: AppConfig;
    session: SessionStore;
    processor: InterviewProcessor;
    taxonomy?: AssessmentTaxonomy;
    now?: () => Date;
}

export function createApp({ config, session, processor, taxonomy = ASSESSMENT_TAXONOMY, now }: AppDeps): Express {
    const app = express();

    // Middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use('/interviews', createInterviewRoutes({ config, session, processor }));
    app.use('/result', createResultRoutes({ session, taxonomy, now }));

    app.get('/taxonomy', (req: Request, res: Response) => {
        res.json({
            categories: taxonomyToRecord(taxonomy),
            experienceLevels: EXPERIENCE_LEVELS
        });
    });

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // Root route
    app.get('/', (req: Request, res: Response) => {
        res.json({
            message: 'Interview Assessment API',
            version: '1.0.0',
            description: 'Transcribes interview recordings and scores them against a weighted competency taxonomy',
            endpoints: {
                'Interviews': {
                    'POST /interviews': 'Upload a recording and start analysis (async)',
                    'GET /interviews/current': 'Status and progress of the latest submission',
                    'DELETE /interviews/current': 'Clear the stored analysis'
                },
                'Results': {
                    'GET /result': 'Latest assessment and transcript',
                    'GET /result/analytics': 'Top categories, score contributions and recommendations',
                    'GET /result/export/:format': 'Download as json, csv or txt'
                },
                'System': {
                    'GET /taxonomy': 'Assessment categories and weights',
                    'GET /health': 'Health check',
                    'GET /': 'API information'
                }
            },
            uploads: {
                formats: ALLOWED_MEDIA_EXTENSIONS,
                maxSizeMb: Math.round(config.maxFileSizeBytes / (1024 * 1024))
            }
        });
    });

    return app;
}
