import { NextFunction, Request, Response, Router } from 'express';
import fs from 'fs';
import multer from 'multer';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../config/env';
import { logger } from '../config/logger';
import { ValidationError } from '../errors/assessment.errors';
import { SessionStore } from '../session/session-store';
import { EXPERIENCE_LEVELS, InterviewContext } from '../types/assessment';
import { ALLOWED_MEDIA_EXTENSIONS, isAllowedExtension, sanitizeFilename, toTempMedia, validateMedia } from '../utils/media.util';
import { InterviewProcessor } from '../workers/interview-processor';
import { sendError } from './http-errors';

// Validation schema for the submission form fields
const submissionSchema = z.object({
    jobRole: z.string().trim().min(1, 'Job role is required'),
    experienceLevel: z.enum(EXPERIENCE_LEVELS),
    candidateName: z.string().trim().optional(),
    notes: z.string().trim().optional(),
    mode: z.enum(['transcript', 'video']).default('transcript')
});

export interface InterviewRouteDeps {
    config: AppConfig;
    session: SessionStore;
    processor: InterviewProcessor;
}

export function createInterviewRoutes({ config, session, processor }: InterviewRouteDeps): Router {
    const router = Router();

    // Create storage directory if it doesn't exist
    fs.mkdirSync(config.storageDir, { recursive: true });

    const storage = multer.diskStorage({
        destination: (req, file, cb) => {
            cb(null, config.storageDir);
        },
        filename: (req, file, cb) => {
            const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
            const base = sanitizeFilename(path.basename(file.originalname, path.extname(file.originalname)));
            cb(null, `${base}-${uniqueSuffix}${path.extname(file.originalname).toLowerCase()}`);
        }
    });

    const upload = multer({
        storage,
        limits: {
            fileSize: config.maxFileSizeBytes,
            files: 1
        },
        fileFilter: (req, file, cb) => {
            if (isAllowedExtension(file.originalname)) {
                cb(null, true);
            } else {
                cb(new ValidationError(`Unsupported file format. Supported formats: ${ALLOWED_MEDIA_EXTENSIONS.join(', ')}`));
            }
        }
    });

    const receiveMedia = (req: Request, res: Response, next: NextFunction) => {
        upload.single('media')(req, res, (error: unknown) => {
            if (!error) {
                return next();
            }
            if (error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE') {
                const limitMb = Math.round(config.maxFileSizeBytes / (1024 * 1024));
                return sendError(res, new ValidationError(`File size exceeds ${limitMb}MB limit`), 'Interview upload');
            }
            if (error instanceof multer.MulterError) {
                return sendError(res, new ValidationError(error.message), 'Interview upload');
            }
            return sendError(res, error, 'Interview upload');
        });
    };

    /**
     * POST /interviews
     *
     * Upload an interview recording and start its analysis.
     * Multipart: media (file), jobRole, experienceLevel, candidateName?, notes?, mode?
     * Returns: 202 { id, status }
     */
    router.post('/', receiveMedia, async (req: Request, res: Response) => {
        const file = req.file;
        if (!file) {
            return res.status(400).json({
                error: 'Interview submission failed',
                code: 'validation_error',
                message: 'An interview recording is required in the "media" field'
            });
        }

        const media = toTempMedia({ path: file.path, originalName: file.originalname });

        try {
            let context: InterviewContext;
            try {
                validateMedia({ originalName: file.originalname, size: file.size }, config.maxFileSizeBytes);
                context = submissionSchema.parse(req.body);
            } catch (error) {
                await media.release();
                throw error;
            }

            const { submission } = await processor.submit(media, context);

            res.status(202).json({
                id: submission.id,
                status: submission.status,
                file: submission.fileName
            });

        } catch (error) {
            sendError(res, error, 'Interview submission');
        }
    });

    /**
     * GET /interviews/current
     *
     * Status, progress log and error (if any) of the latest submission.
     */
    router.get('/current', (req: Request, res: Response) => {
        res.json(session.snapshot());
    });

    /**
     * DELETE /interviews/current
     *
     * Clear the session's stored analysis. Refused while one is running.
     */
    router.delete('/current', (req: Request, res: Response) => {
        try {
            session.clear();
            logger.info({ sessionId: session.sessionId }, 'Session cleared');
            res.status(204).end();
        } catch (error) {
            sendError(res, error, 'Session clear');
        }
    });

    return router;
}
