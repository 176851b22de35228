import { Request, Response, Router } from 'express';
import { ValidationError } from '../errors/assessment.errors';
import { buildAnalytics } from '../reports/assessment-analytics';
import { EXPORT_CONTENT_TYPES, ExportFormat, exportFileName, renderExport } from '../reports/report-exporter';
import { SessionStore } from '../session/session-store';
import { AssessmentTaxonomy } from '../taxonomy/assessment-taxonomy';
import { sendError } from './http-errors';

export interface ResultRouteDeps {
    session: SessionStore;
    taxonomy: AssessmentTaxonomy;
    now?: () => Date;
}

function isExportFormat(value: string): value is ExportFormat {
    return value === 'json' || value === 'csv' || value === 'txt';
}

export function createResultRoutes({ session, taxonomy, now = () => new Date() }: ResultRouteDeps): Router {
    const router = Router();

    /**
     * GET /result
     *
     * The latest completed assessment and the transcript it was built from.
     */
    router.get('/', (req: Request, res: Response) => {
        try {
            res.json({
                result: session.getResult(),
                transcript: session.getTranscript()
            });
        } catch (error) {
            sendError(res, error, 'Result retrieval');
        }
    });

    /**
     * GET /result/analytics
     */
    router.get('/analytics', (req: Request, res: Response) => {
        try {
            res.json(buildAnalytics(session.getResult(), taxonomy));
        } catch (error) {
            sendError(res, error, 'Analytics');
        }
    });

    /**
     * GET /result/export/:format
     *
     * Download the latest assessment as json, csv or txt.
     */
    router.get('/export/:format', (req: Request, res: Response) => {
        try {
            const format = req.params.format.toLowerCase();
            if (!isExportFormat(format)) {
                throw new ValidationError('Unsupported export format. Use json, csv or txt');
            }

            const result = session.getResult();
            const date = now();
            const fileName = exportFileName(format, result.metadata.candidate_name, date);

            res.setHeader('Content-Type', `${EXPORT_CONTENT_TYPES[format]}; charset=utf-8`);
            res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
            res.send(renderExport(format, result, taxonomy, date));
        } catch (error) {
            sendError(res, error, 'Export');
        }
    });

    return router;
}
