import { Response } from 'express';
import { z } from 'zod';
import { logger } from '../config/logger';
import { AssessmentError, errorMessage } from '../errors/assessment.errors';

/**
 * Map an error raised in a route to the JSON error payload.
 */
export function sendError(res: Response, error: unknown, context: string): Response {
    if (error instanceof z.ZodError) {
        return res.status(400).json({
            error: 'Validation failed',
            code: 'validation_error',
            message: error.issues.map(issue => issue.message).join('; '),
            details: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        });
    }

    if (error instanceof AssessmentError) {
        logger.warn({ code: error.code, error: error.message }, `${context} rejected`);
        return res.status(error.httpStatus).json({
            error: `${context} failed`,
            code: error.code,
            message: error.message
        });
    }

    logger.error({ error: errorMessage(error) }, `${context} failed`);
    return res.status(500).json({
        error: `${context} failed`,
        code: 'internal_error',
        message: 'Unknown error'
    });
}
